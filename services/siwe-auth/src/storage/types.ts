import type { Address } from "@walletgate/shared";
import type { NonceRecord, SessionRecord } from "../auth/types.js";

/**
 * Wallet identity row
 */
export interface WalletRecord {
  /** Lowercase address, primary key */
  address: Address;
  createdAt: number;
  lastLoginAt: number | null;
  ensName: string | null;
  ensAvatar: string | null;
  /** Inactive wallets cannot log in */
  isActive: boolean;
}

export interface WalletRepository {
  get(address: Address): Promise<WalletRecord | null>;
  getOrCreate(address: Address, now: number): Promise<WalletRecord>;
  recordLogin(address: Address, at: number): Promise<void>;
  updateEnsProfile(address: Address, ensName: string | null, ensAvatar: string | null): Promise<void>;
  setActive(address: Address, isActive: boolean): Promise<void>;
}

export interface GroupRepository {
  /** Create the group if it does not exist yet */
  ensureGroup(name: string): Promise<void>;
  /** Group names the wallet belongs to, sorted */
  listGroups(address: Address): Promise<string[]>;
  addMember(name: string, address: Address): Promise<void>;
  removeMember(name: string, address: Address): Promise<void>;
}

export interface NonceRepository {
  insert(record: NonceRecord): Promise<void>;
  /**
   * Mark an unconsumed nonce consumed and return it, in one atomic step.
   * Returns null for unknown or already consumed nonces.
   */
  take(nonce: string, at: number): Promise<NonceRecord | null>;
  /** Delete nonces that expired at or before `now` */
  purgeExpired(now: number): Promise<number>;
}

export interface SessionRepository {
  insert(record: SessionRecord): Promise<void>;
  get(id: string): Promise<SessionRecord | null>;
  /**
   * Replace the session `oldId` with `next`, in one atomic step.
   * Returns false when `oldId` no longer exists (already rotated or destroyed).
   */
  rotate(oldId: string, next: SessionRecord): Promise<boolean>;
  delete(id: string): Promise<void>;
  purgeExpired(now: number): Promise<number>;
}

/**
 * Everything the auth service persists
 */
export interface AuthStorage {
  kind: "memory" | "postgres";
  wallets: WalletRepository;
  groups: GroupRepository;
  nonces: NonceRepository;
  sessions: SessionRepository;
  close(): Promise<void>;
}
