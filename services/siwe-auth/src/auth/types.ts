import { ConfigurationError, type Address, type GroupRemovalMode } from "@walletgate/shared";
import type { SiweMessage } from "viem/siwe";

/**
 * Millisecond clock, injectable for tests
 */
export type Clock = () => number;

/**
 * Nonce record as persisted by a NonceRepository
 */
export interface NonceRecord {
  nonce: string;
  issuedAt: number;
  expiresAt: number;
  /** Set exactly once, when a login attempt consumes the nonce */
  consumedAt: number | null;
}

/**
 * Server-side session record
 */
export interface SessionRecord {
  /** Opaque session id, replaced on every refresh */
  id: string;
  /** Wallet the session is bound to (never changes) */
  address: Address;
  /** Time of the original login, carried across rotations */
  createdAt: number;
  expiresAt: number;
  /** Number of refreshes since login */
  rotation: number;
}

/**
 * Session token payload
 */
export interface SessionPayload {
  /** Wallet address (subject) */
  sub: Address;
  /** Server-side session id */
  sid: string;
  /** Issued at timestamp */
  iat: number;
  /** Expiration timestamp */
  exp: number;
}

/**
 * What callers get back when a session is created or rotated
 */
export interface SessionHandle {
  token: string;
  address: Address;
  expiresAt: number;
}

/**
 * SIWE message as submitted in a login request body
 */
export interface SiweMessageFields {
  domain: string;
  address: string;
  uri: string;
  version: string;
  chainId: number;
  nonce: string;
  issuedAt: string;
  statement?: string;
  expirationTime?: string;
  notBefore?: string;
  requestId?: string;
  resources?: string[];
  scheme?: string;
}

/**
 * Result of a successful message verification
 */
export interface VerifiedIdentity {
  /** Lowercase wallet address */
  address: Address;
  chainId: number;
  issuedAt: Date;
  nonce: string;
  message: SiweMessage;
}

/**
 * Auth configuration
 */
export interface AuthConfig {
  /** Chain RPC endpoint (required) */
  providerUrl: string;
  /** Domain SIWE messages must be bound to */
  domain: string;
  /** URI whose origin SIWE messages must carry (default: https://<domain>) */
  uri: string;
  /** JWT secret key (must be at least 32 bytes for HS256) */
  jwtSecret: string;
  /** Nonce TTL in milliseconds (default: 10 minutes) */
  nonceTtlMs: number;
  /** Session TTL in milliseconds (default: 3 hours) */
  sessionTtlMs: number;
  /** Absolute session lifetime across refreshes (default: 24 hours) */
  sessionMaxAgeMs: number;
  /** Tolerated clock drift for issuedAt / notBefore (default: 60 seconds) */
  clockSkewMs: number;
  /** Per-strategy chain read timeout (default: 5 seconds) */
  chainTimeoutMs: number;
  groupsOnAuth: boolean;
  ensProfileOnAuth: boolean;
  groupRemoval: GroupRemovalMode;
  csrfExempt: boolean;
  cookieName: string;
  secureCookies: boolean;
}

export const DEFAULT_AUTH_CONFIG: Omit<AuthConfig, "providerUrl" | "domain" | "uri" | "jwtSecret"> = {
  nonceTtlMs: 10 * 60 * 1000, // 10 minutes
  sessionTtlMs: 3 * 60 * 60 * 1000, // 3 hours
  sessionMaxAgeMs: 24 * 60 * 60 * 1000, // 24 hours
  clockSkewMs: 60 * 1000,
  chainTimeoutMs: 5000,
  groupsOnAuth: false,
  ensProfileOnAuth: true,
  groupRemoval: "eager",
  csrfExempt: false,
  cookieName: "siwe_session",
  secureCookies: true,
};

export type AuthConfigInput = Partial<AuthConfig> & Pick<AuthConfig, "jwtSecret">;

/**
 * Merge defaults into a partial config and validate what has no default
 */
export function resolveAuthConfig(input: AuthConfigInput): AuthConfig {
  if (!input.providerUrl) {
    throw new ConfigurationError("Chain provider URL is required", ["SIWE_PROVIDER_URL"]);
  }
  if (!input.domain) {
    throw new ConfigurationError("SIWE domain is required", ["SIWE_DOMAIN"]);
  }
  if (input.jwtSecret.length < 32) {
    throw new ConfigurationError("Session secret must be at least 32 characters", ["SESSION_SECRET"]);
  }

  // Only defined values override defaults
  const d = DEFAULT_AUTH_CONFIG;
  return {
    providerUrl: input.providerUrl,
    domain: input.domain,
    uri: input.uri ?? `https://${input.domain}`,
    jwtSecret: input.jwtSecret,
    nonceTtlMs: input.nonceTtlMs ?? d.nonceTtlMs,
    sessionTtlMs: input.sessionTtlMs ?? d.sessionTtlMs,
    sessionMaxAgeMs: input.sessionMaxAgeMs ?? d.sessionMaxAgeMs,
    clockSkewMs: input.clockSkewMs ?? d.clockSkewMs,
    chainTimeoutMs: input.chainTimeoutMs ?? d.chainTimeoutMs,
    groupsOnAuth: input.groupsOnAuth ?? d.groupsOnAuth,
    ensProfileOnAuth: input.ensProfileOnAuth ?? d.ensProfileOnAuth,
    groupRemoval: input.groupRemoval ?? d.groupRemoval,
    csrfExempt: input.csrfExempt ?? d.csrfExempt,
    cookieName: input.cookieName ?? d.cookieName,
    secureCookies: input.secureCookies ?? d.secureCookies,
  };
}
