export { createAuthRoutes, handleAuthError } from "./auth.js";
export { createWalletRoutes } from "./wallet.js";
