import { Router, type Request, type Response, type NextFunction, type CookieOptions } from "express";
import { AuthError, statusForAuthError, type AuthService, type SessionHandle } from "../auth/index.js";
import { extractSessionToken } from "../middleware/index.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map AuthError to its JSON response; anything else goes to the error handler
 */
export function handleAuthError(err: unknown, res: Response, next: NextFunction): void {
  if (err instanceof AuthError) {
    res.status(statusForAuthError(err)).json({
      error: err.message,
      code: err.code,
    });
    return;
  }
  next(err);
}

/**
 * Create auth routes with the given auth service
 */
export function createAuthRoutes(authService: AuthService): Router {
  const router = Router();
  const { cookieName, secureCookies } = authService.config;

  const cookieOptions = (): CookieOptions => ({
    httpOnly: true,
    secure: secureCookies,
    sameSite: "lax",
    path: "/",
  });

  const setSessionCookie = (res: Response, handle: SessionHandle): void => {
    res.cookie(cookieName, handle.token, { ...cookieOptions(), expires: new Date(handle.expiresAt) });
  };

  const missingToken = (res: Response): void => {
    res.status(401).json({
      error: "Missing session token",
      code: "MISSING_AUTH",
    });
  };

  /**
   * GET /auth/nonce
   * Issue a single-use nonce for a SIWE message
   */
  router.get("/nonce", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await authService.requestNonce());
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /auth/login
   * Verify a signed SIWE message and open a session
   * Body: { message, signature }
   */
  router.post("/login", async (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !body.message || !body.signature) {
      res.status(400).json({
        error: "Missing required fields: message, signature",
        code: "MISSING_FIELDS",
      });
      return;
    }

    try {
      const result = await authService.login(body.message, body.signature);
      setSessionCookie(res, result);
      res.json({
        address: result.address,
        token: result.token,
        expiresAt: result.expiresAt,
        groups: result.groups,
        ensName: result.ensName,
      });
    } catch (err) {
      handleAuthError(err, res, next);
    }
  });

  /**
   * POST /auth/refresh
   * Rotate the current session
   */
  router.post("/refresh", async (req: Request, res: Response, next: NextFunction) => {
    const token = extractSessionToken(req, cookieName);
    if (!token) {
      missingToken(res);
      return;
    }

    try {
      const handle = await authService.refresh(token);
      setSessionCookie(res, handle);
      res.json(handle);
    } catch (err) {
      handleAuthError(err, res, next);
    }
  });

  /**
   * GET /auth/verify
   * Check the current session
   */
  router.get("/verify", async (req: Request, res: Response, next: NextFunction) => {
    const token = extractSessionToken(req, cookieName);
    if (!token) {
      missingToken(res);
      return;
    }

    try {
      res.json(await authService.verify(token));
    } catch (err) {
      handleAuthError(err, res, next);
    }
  });

  /**
   * POST /auth/logout
   * End the current session, if any
   */
  router.post("/logout", async (req: Request, res: Response, next: NextFunction) => {
    const token = extractSessionToken(req, cookieName);
    try {
      if (token) {
        await authService.logout(token);
      }
      res.clearCookie(cookieName, cookieOptions());
      res.json({ success: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
