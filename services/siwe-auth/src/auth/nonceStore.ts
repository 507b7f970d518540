import { randomBytes } from "node:crypto";
import type { NonceRepository } from "../storage/index.js";
import { AuthError } from "./errors.js";
import type { Clock, NonceRecord } from "./types.js";

/**
 * Single-use SIWE nonces backed by a NonceRepository.
 * 12 random bytes = 96 bits, hex encoded (EIP-4361 requires >= 8 alphanumerics).
 */
export class NonceStore {
  constructor(
    private repo: NonceRepository,
    private ttlMs: number = 10 * 60 * 1000,
    private now: Clock = Date.now
  ) {}

  /**
   * Issue a new nonce. Expired nonces are purged first, so the table
   * only grows with outstanding challenges.
   */
  async issue(): Promise<NonceRecord> {
    const now = this.now();
    await this.repo.purgeExpired(now);

    const record: NonceRecord = {
      nonce: randomBytes(12).toString("hex"),
      issuedAt: now,
      expiresAt: now + this.ttlMs,
      consumedAt: null,
    };

    await this.repo.insert(record);
    return record;
  }

  /**
   * Consume a nonce (one-time use).
   * Unknown, expired and already consumed nonces all fail with INVALID_NONCE.
   */
  async consume(nonce: string): Promise<NonceRecord> {
    const now = this.now();
    const record = await this.repo.take(nonce, now);

    if (!record || now >= record.expiresAt) {
      throw new AuthError("Invalid or expired nonce", "INVALID_NONCE");
    }

    return record;
  }

  /**
   * Remove expired nonces
   */
  async cleanup(): Promise<number> {
    return this.repo.purgeExpired(this.now());
  }
}
