/**
 * Request fields set by this app's middleware, merged into Express's own
 * `Request` through the global namespace.
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestIdMiddleware; echoed as X-Request-ID */
      requestId?: string;
    }
  }
}

export {};
