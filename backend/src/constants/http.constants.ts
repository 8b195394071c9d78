/**
 * HTTP Status Codes and Response Constants
 */

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  SERVICE_UNAVAILABLE: 503,
} as const;

export const HTTP_HEADERS = {
  /** CORS options success status */
  OPTIONS_SUCCESS_STATUS: 200,

  REQUEST_ID: 'X-Request-ID',
  /** Milliseconds spent resolving a media filename */
  MEDIA_LOOKUP_TIME: 'X-Media-Lookup-Time-ms',
  /** Set when a media file was found through a fallback tier */
  MEDIA_FALLBACK: 'X-Media-Fallback',
} as const;

export const SECURITY_HEADERS = {
  /** HSTS max age in seconds (1 year) */
  HSTS_MAX_AGE_SECONDS: 31536000,
  HSTS_INCLUDE_SUBDOMAINS: true,
  HSTS_PRELOAD: false,
} as const;

/** Longest incoming X-Request-ID that is reused as-is */
export const REQUEST_ID_MAX_LENGTH = 128;
