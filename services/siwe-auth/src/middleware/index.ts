export {
  createSessionMiddleware,
  extractSessionToken,
  readCookie,
  type AuthenticatedRequest,
} from "./session.js";
export { createCsrfGuard, type CsrfOptions } from "./csrf.js";
