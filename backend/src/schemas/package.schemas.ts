import { z } from 'zod';
import { VALIDATION_LIMITS } from '../constants/validation.constants';

export const SwitchPackageSchema = z.object({
  filename: z
    .string()
    .trim()
    .min(1, 'Filename is required')
    .max(VALIDATION_LIMITS.PACKAGE_FILENAME_MAX)
    .regex(/\.apkg$/, 'Filename must end in .apkg'),
});

export const MediaFilenameParamsSchema = z.object({
  filename: z.string().min(1).max(VALIDATION_LIMITS.MEDIA_FILENAME_MAX),
});
