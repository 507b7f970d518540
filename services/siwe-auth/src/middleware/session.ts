import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Address } from "@walletgate/shared";
import { AuthError, statusForAuthError, type AuthService } from "../auth/index.js";

/**
 * Extended request with authenticated wallet address
 */
export interface AuthenticatedRequest extends Request {
  wallet?: Address;
  sessionToken?: string;
}

/**
 * Value of a cookie from a raw Cookie header
 */
export function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;
  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() === name) {
      const value = part.slice(eq + 1).trim();
      return value || null;
    }
  }
  return null;
}

/**
 * Session token from `Authorization: Bearer <token>`, falling back to the
 * session cookie
 */
export function extractSessionToken(req: Request, cookieName: string): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader) {
    const parts = authHeader.split(" ");
    if (parts.length === 2 && parts[0] === "Bearer" && parts[1]) {
      return parts[1];
    }
  }
  return readCookie(req.headers.cookie, cookieName);
}

/**
 * Create middleware that requires a live session
 */
export function createSessionMiddleware(authService: AuthService): RequestHandler {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    const token = extractSessionToken(req, authService.config.cookieName);

    if (!token) {
      res.status(401).json({
        error: "Missing session token",
        code: "MISSING_AUTH",
      });
      return;
    }

    try {
      const session = await authService.verify(token);
      req.wallet = session.address;
      req.sessionToken = token;
    } catch (err) {
      if (err instanceof AuthError) {
        res.status(statusForAuthError(err)).json({ error: err.message, code: err.code });
        return;
      }
      next(err);
      return;
    }
    next();
  };
}
