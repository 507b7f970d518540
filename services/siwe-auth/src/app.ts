import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { AuthError, AuthService, statusForAuthError, type AuthConfigInput, type Clock } from "./auth/index.js";
import type { ChainDataProvider, EnsResolver } from "./chain/index.js";
import type { GroupBinding } from "./groups/index.js";
import { createCsrfGuard } from "./middleware/index.js";
import { createAuthRoutes, createWalletRoutes } from "./routes/index.js";
import { MemoryStorage, type AuthStorage } from "./storage/index.js";

export interface AppConfig extends AuthConfigInput {
  /** Extra origins allowed for CORS and the CSRF guard */
  allowedOrigins?: string[];
  /** Log one line per request (default: true) */
  logRequests?: boolean;
}

export interface AppDeps {
  chainProvider: ChainDataProvider;
  ensResolver?: EnsResolver;
  /** Defaults to in-memory storage */
  storage?: AuthStorage;
  groups?: readonly GroupBinding[];
  now?: Clock;
}

export interface AppContext {
  app: Express;
  authService: AuthService;
  storage: AuthStorage;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Create the auth Express app
 */
export function createApp(config: AppConfig, deps: AppDeps): AppContext {
  const storage = deps.storage ?? new MemoryStorage();
  const authService = new AuthService(config, {
    storage,
    chainProvider: deps.chainProvider,
    ensResolver: deps.ensResolver,
    groups: deps.groups,
    now: deps.now,
  });

  const siteOrigin = new URL(authService.config.uri).origin;
  const allowedOrigins = new Set([siteOrigin, ...(config.allowedOrigins ?? [])]);

  const app = express();
  app.set("trust proxy", true);

  // Middleware
  if (config.logRequests ?? true) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const started = Date.now();
      res.on("finish", () => {
        console.log(
          `${new Date().toISOString()} ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`
        );
      });
      next();
    });
  }
  app.use(express.json());
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.has(origin)) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Access-Control-Allow-Credentials", "true");
      res.header("Vary", "Origin");
    }
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });
  app.use(createCsrfGuard({ exempt: authService.config.csrfExempt, trustedOrigins: allowedOrigins }));

  // Routes
  app.use("/auth/wallet", createWalletRoutes(authService));
  app.use("/auth", createAuthRoutes(authService));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", storage: storage.kind });
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({
        error: "Request body is not valid JSON",
        code: "MALFORMED_BODY",
      });
      return;
    }
    if (err instanceof AuthError) {
      res.status(statusForAuthError(err)).json({ error: err.message, code: err.code });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      code: "INTERNAL_ERROR",
    });
  });

  return { app, authService, storage };
}
