/**
 * Error codes surfaced by the auth flow.
 *
 * INVALID_NONCE covers unknown, expired and already-used nonces alike so a
 * caller cannot probe which one it hit.
 */
export type AuthErrorCode =
  | "MALFORMED_MESSAGE"
  | "DOMAIN_MISMATCH"
  | "INVALID_NONCE"
  | "MESSAGE_EXPIRED"
  | "SIGNATURE_MISMATCH"
  | "WALLET_DISABLED"
  | "SESSION_NOT_FOUND"
  | "SESSION_EXPIRED";

/**
 * Error thrown when authentication fails
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public code: AuthErrorCode
  ) {
    super(message);
    this.name = "AuthError";
  }
}

const STATUS_BY_CODE: Record<AuthErrorCode, number> = {
  MALFORMED_MESSAGE: 400,
  INVALID_NONCE: 400,
  DOMAIN_MISMATCH: 401,
  MESSAGE_EXPIRED: 401,
  SIGNATURE_MISMATCH: 401,
  WALLET_DISABLED: 403,
  SESSION_NOT_FOUND: 401,
  SESSION_EXPIRED: 401,
};

/**
 * HTTP status for an auth error code
 */
export function statusForAuthError(err: AuthError): number {
  return STATUS_BY_CODE[err.code];
}
