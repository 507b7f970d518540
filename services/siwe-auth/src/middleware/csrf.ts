import type { Request, Response, NextFunction, RequestHandler } from "express";

const UNSAFE_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

function originOf(value: string | undefined): string | null {
  if (!value) return null;
  try {
    return new URL(value).origin;
  } catch {
    return null;
  }
}

export interface CsrfOptions {
  /** Skip the check entirely */
  exempt: boolean;
  trustedOrigins: Iterable<string>;
}

/**
 * Reject state-changing requests whose Origin (or Referer) is not trusted
 */
export function createCsrfGuard(options: CsrfOptions): RequestHandler {
  const trusted = new Set(options.trustedOrigins);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (options.exempt || !UNSAFE_METHODS.has(req.method)) {
      next();
      return;
    }

    const origin = originOf(req.headers.origin) ?? originOf(req.headers.referer);
    if (!origin || !trusted.has(origin)) {
      console.warn(`[Auth] CSRF check failed for ${req.method} ${req.path} (origin: ${origin ?? "none"})`);
      res.status(403).json({
        error: "Request origin is not trusted",
        code: "CSRF_FAILED",
      });
      return;
    }
    next();
  };
}
