export { AuthService, type AuthServiceDeps, type LoginResult, type WalletProfile } from "./authService.js";
export { AuthError, statusForAuthError, type AuthErrorCode } from "./errors.js";
export { NonceStore } from "./nonceStore.js";
export { SessionManager } from "./session.js";
export { SiweVerifier, parseSiweInput, type SiweVerifierConfig } from "./siweVerifier.js";
export {
  DEFAULT_AUTH_CONFIG,
  resolveAuthConfig,
  type AuthConfig,
  type AuthConfigInput,
  type Clock,
  type NonceRecord,
  type SessionHandle,
  type SessionPayload,
  type SessionRecord,
  type SiweMessageFields,
  type VerifiedIdentity,
} from "./types.js";
