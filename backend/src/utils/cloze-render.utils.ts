import { createClozePattern } from './card-type.utils';

export interface ClozeRenderOptions {
  /** Show the deleted text instead of a placeholder */
  reveal: boolean;
  /**
   * Cloze number this card asks about. Markers with another number render
   * as plain text. When omitted every marker is active.
   */
  activeIndex?: number;
}

export const CLOZE_BLANK = '[...]';

/**
 * Turn `{{cN::content::hint}}` markers into presentation HTML.
 *
 * Content is inserted verbatim: field HTML such as `<strong>` must survive.
 */
export function renderCloze(html: string, { reveal, activeIndex }: ClozeRenderOptions): string {
  if (!html) return html;

  return html.replace(createClozePattern(), (_marker, num: string, content: string, hint?: string) => {
    const ordinal = Number.parseInt(num, 10);
    if (activeIndex !== undefined && ordinal !== activeIndex) {
      return content;
    }
    if (reveal) {
      return `<mark class="cloze revealed" data-cloze="${ordinal}">${content}</mark>`;
    }
    if (hint) {
      return `<span class="cloze hint" data-cloze="${ordinal}">${hint}</span>`;
    }
    return `<span class="cloze blank" data-cloze="${ordinal}">${CLOZE_BLANK}</span>`;
  });
}
