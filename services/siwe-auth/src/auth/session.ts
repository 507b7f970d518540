import { randomBytes } from "node:crypto";
import * as jose from "jose";
import { isValidAddress, type Address } from "@walletgate/shared";
import type { SessionRepository, WalletRepository } from "../storage/index.js";
import { AuthError } from "./errors.js";
import type { AuthConfig, Clock, SessionHandle, SessionPayload, SessionRecord } from "./types.js";

function newSessionId(): string {
  return randomBytes(32).toString("base64url");
}

/**
 * Server-side sessions bound to a wallet address.
 *
 * The handle given to clients is an HS256 JWT whose `sid` claim names the
 * server-side record; the record decides validity, so logout and rotation
 * take effect immediately. Refresh extends a session by the TTL but never
 * past `createdAt + sessionMaxAgeMs`.
 */
export class SessionManager {
  private secret: Uint8Array;
  private ttlMs: number;
  private maxAgeMs: number;

  constructor(
    private sessions: SessionRepository,
    private wallets: WalletRepository,
    config: Pick<AuthConfig, "jwtSecret" | "sessionTtlMs" | "sessionMaxAgeMs">,
    private now: Clock = Date.now
  ) {
    // jose requires the secret as Uint8Array
    this.secret = new TextEncoder().encode(config.jwtSecret);
    this.ttlMs = config.sessionTtlMs;
    this.maxAgeMs = config.sessionMaxAgeMs;
  }

  /**
   * Create a session for a verified address, creating the wallet on first login
   */
  async create(address: Address): Promise<SessionHandle> {
    const now = this.now();
    const wallet = await this.wallets.getOrCreate(address, now);
    if (!wallet.isActive) {
      throw new AuthError("Wallet is disabled", "WALLET_DISABLED");
    }
    await this.wallets.recordLogin(address, now);

    const record: SessionRecord = {
      id: newSessionId(),
      address,
      createdAt: now,
      expiresAt: now + Math.min(this.ttlMs, this.maxAgeMs),
      rotation: 0,
    };
    await this.sessions.insert(record);

    return this.issueHandle(record);
  }

  /**
   * Resolve a session token to its live record
   */
  async verify(token: string): Promise<SessionRecord> {
    const payload = await this.decode(token);
    const record = await this.sessions.get(payload.sid);

    if (!record || record.address !== payload.sub) {
      throw new AuthError("Session not found", "SESSION_NOT_FOUND");
    }
    if (this.now() >= record.expiresAt) {
      await this.sessions.delete(record.id);
      throw new AuthError("Session expired", "SESSION_EXPIRED");
    }

    return record;
  }

  /**
   * Rotate a session: new id, new token, expiry pushed out (up to the ceiling).
   * The old token stops working.
   */
  async refresh(token: string): Promise<SessionHandle> {
    const current = await this.verify(token);
    const now = this.now();
    const ceiling = current.createdAt + this.maxAgeMs;

    if (now >= ceiling) {
      await this.sessions.delete(current.id);
      throw new AuthError("Session reached its maximum lifetime", "SESSION_EXPIRED");
    }

    const next: SessionRecord = {
      id: newSessionId(),
      address: current.address,
      createdAt: current.createdAt,
      expiresAt: Math.min(now + this.ttlMs, ceiling),
      rotation: current.rotation + 1,
    };

    // A concurrent refresh of the same token already won
    if (!(await this.sessions.rotate(current.id, next))) {
      throw new AuthError("Session not found", "SESSION_NOT_FOUND");
    }

    return this.issueHandle(next);
  }

  /**
   * Invalidate a session. Unknown, expired or garbage tokens are a no-op.
   */
  async destroy(token: string): Promise<void> {
    const sid = await this.sessionIdOf(token);
    if (sid) {
      await this.sessions.delete(sid);
    }
  }

  /**
   * Remove expired session records
   */
  async cleanup(): Promise<number> {
    return this.sessions.purgeExpired(this.now());
  }

  private async issueHandle(record: SessionRecord): Promise<SessionHandle> {
    const token = await new jose.SignJWT({ sid: record.id })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject(record.address)
      .setIssuedAt(Math.floor(this.now() / 1000))
      .setExpirationTime(Math.ceil(record.expiresAt / 1000))
      .sign(this.secret);

    return { token, address: record.address, expiresAt: record.expiresAt };
  }

  /**
   * Verify the token signature and claims
   */
  private async decode(token: string): Promise<SessionPayload> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, {
        algorithms: ["HS256"],
        currentDate: new Date(this.now()),
      }));
    } catch (err) {
      if (err instanceof jose.errors.JWTExpired) {
        throw new AuthError("Session expired", "SESSION_EXPIRED");
      }
      throw new AuthError("Session not found", "SESSION_NOT_FOUND");
    }

    const { sub, sid, iat, exp } = payload;
    if (!sub || !isValidAddress(sub) || typeof sid !== "string" || !iat || !exp) {
      throw new AuthError("Session not found", "SESSION_NOT_FOUND");
    }
    return { sub, sid, iat, exp };
  }

  private async sessionIdOf(token: string): Promise<string | null> {
    try {
      return (await this.decode(token)).sid;
    } catch (err) {
      if (!(err instanceof AuthError)) throw err;
      if (err.code !== "SESSION_EXPIRED") return null;
      // Signature was valid (jose checks it before exp), so the claim can be trusted
      const { sid } = jose.decodeJwt(token);
      return typeof sid === "string" ? sid : null;
    }
  }
}
