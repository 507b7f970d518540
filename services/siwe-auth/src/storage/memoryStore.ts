import type { Address } from "@walletgate/shared";
import type { NonceRecord, SessionRecord } from "../auth/types.js";
import type {
  AuthStorage,
  GroupRepository,
  NonceRepository,
  SessionRepository,
  WalletRecord,
  WalletRepository,
} from "./types.js";

/**
 * In-memory wallet table.
 * Each method completes its read-modify-write without yielding, so
 * concurrent requests in one process cannot interleave inside it.
 */
export class MemoryWalletRepository implements WalletRepository {
  private wallets = new Map<Address, WalletRecord>();

  async get(address: Address): Promise<WalletRecord | null> {
    const wallet = this.wallets.get(address);
    return wallet ? { ...wallet } : null;
  }

  async getOrCreate(address: Address, now: number): Promise<WalletRecord> {
    let wallet = this.wallets.get(address);
    if (!wallet) {
      wallet = {
        address,
        createdAt: now,
        lastLoginAt: null,
        ensName: null,
        ensAvatar: null,
        isActive: true,
      };
      this.wallets.set(address, wallet);
    }
    return { ...wallet };
  }

  async recordLogin(address: Address, at: number): Promise<void> {
    const wallet = this.wallets.get(address);
    if (wallet) wallet.lastLoginAt = at;
  }

  async updateEnsProfile(address: Address, ensName: string | null, ensAvatar: string | null): Promise<void> {
    const wallet = this.wallets.get(address);
    if (wallet) {
      wallet.ensName = ensName;
      wallet.ensAvatar = ensAvatar;
    }
  }

  async setActive(address: Address, isActive: boolean): Promise<void> {
    const wallet = this.wallets.get(address);
    if (wallet) wallet.isActive = isActive;
  }

  size(): number {
    return this.wallets.size;
  }
}

export class MemoryGroupRepository implements GroupRepository {
  private groups = new Map<string, Set<Address>>();

  async ensureGroup(name: string): Promise<void> {
    if (!this.groups.has(name)) {
      this.groups.set(name, new Set());
    }
  }

  async listGroups(address: Address): Promise<string[]> {
    const names: string[] = [];
    for (const [name, members] of this.groups) {
      if (members.has(address)) names.push(name);
    }
    return names.sort();
  }

  async addMember(name: string, address: Address): Promise<void> {
    await this.ensureGroup(name);
    this.groups.get(name)?.add(address);
  }

  async removeMember(name: string, address: Address): Promise<void> {
    this.groups.get(name)?.delete(address);
  }

  /** Group names (for tests) */
  names(): string[] {
    return [...this.groups.keys()].sort();
  }
}

export class MemoryNonceRepository implements NonceRepository {
  private nonces = new Map<string, NonceRecord>();

  async insert(record: NonceRecord): Promise<void> {
    this.nonces.set(record.nonce, { ...record });
  }

  async take(nonce: string, at: number): Promise<NonceRecord | null> {
    const record = this.nonces.get(nonce);
    if (!record || record.consumedAt !== null) return null;
    record.consumedAt = at;
    return { ...record };
  }

  async purgeExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [nonce, record] of this.nonces) {
      if (record.expiresAt <= now) {
        this.nonces.delete(nonce);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.nonces.size;
  }
}

export class MemorySessionRepository implements SessionRepository {
  private sessions = new Map<string, SessionRecord>();

  async insert(record: SessionRecord): Promise<void> {
    this.sessions.set(record.id, { ...record });
  }

  async get(id: string): Promise<SessionRecord | null> {
    const record = this.sessions.get(id);
    return record ? { ...record } : null;
  }

  async rotate(oldId: string, next: SessionRecord): Promise<boolean> {
    if (!this.sessions.delete(oldId)) return false;
    this.sessions.set(next.id, { ...next });
    return true;
  }

  async delete(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  async purgeExpired(now: number): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.sessions) {
      if (record.expiresAt <= now) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }
}

/**
 * Process-local storage for tests and local development
 */
export class MemoryStorage implements AuthStorage {
  readonly kind = "memory";
  readonly wallets = new MemoryWalletRepository();
  readonly groups = new MemoryGroupRepository();
  readonly nonces = new MemoryNonceRepository();
  readonly sessions = new MemorySessionRepository();

  async close(): Promise<void> {
    // Nothing to release
  }
}
