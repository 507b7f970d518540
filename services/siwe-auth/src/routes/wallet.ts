import { Router, type Response, type NextFunction } from "express";
import type { AuthService } from "../auth/index.js";
import { createSessionMiddleware, type AuthenticatedRequest } from "../middleware/index.js";

/**
 * Create wallet routes (mounted under /auth/wallet)
 */
export function createWalletRoutes(authService: AuthService): Router {
  const router = Router();

  router.use(createSessionMiddleware(authService));

  /**
   * GET /auth/wallet/me
   * Profile of the signed-in wallet
   */
  router.get("/me", async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    if (!req.wallet) {
      res.status(401).json({ error: "Not authenticated", code: "MISSING_AUTH" });
      return;
    }

    try {
      res.json(await authService.profile(req.wallet));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
