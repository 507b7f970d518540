// PostgreSQL repositories - all DB operations

import { isValidAddress, type Address } from "@walletgate/shared";
import type { NonceRecord, SessionRecord } from "../auth/types.js";
import type { QueryFn } from "./pool.js";
import type {
  AuthStorage,
  GroupRepository,
  NonceRepository,
  SessionRepository,
  WalletRecord,
  WalletRepository,
} from "./types.js";

interface WalletRow {
  address: string;
  created_at: Date;
  last_login_at: Date | null;
  ens_name: string | null;
  ens_avatar: string | null;
  is_active: boolean;
}

interface NonceRow {
  value: string;
  issued_at: Date;
  expires_at: Date;
  consumed_at: Date | null;
}

interface SessionRow {
  id: string;
  address: string;
  created_at: Date;
  expires_at: Date;
  rotation: number;
}

function toAddress(value: string): Address {
  if (!isValidAddress(value)) {
    throw new Error(`Invalid address in database row: ${value}`);
  }
  return value;
}

function toWallet(row: WalletRow): WalletRecord {
  return {
    address: toAddress(row.address),
    createdAt: row.created_at.getTime(),
    lastLoginAt: row.last_login_at ? row.last_login_at.getTime() : null,
    ensName: row.ens_name,
    ensAvatar: row.ens_avatar,
    isActive: row.is_active,
  };
}

function toNonce(row: NonceRow): NonceRecord {
  return {
    nonce: row.value,
    issuedAt: row.issued_at.getTime(),
    expiresAt: row.expires_at.getTime(),
    consumedAt: row.consumed_at ? row.consumed_at.getTime() : null,
  };
}

function toSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    address: toAddress(row.address),
    createdAt: row.created_at.getTime(),
    expiresAt: row.expires_at.getTime(),
    rotation: row.rotation,
  };
}

const WALLET_COLUMNS = "address, created_at, last_login_at, ens_name, ens_avatar, is_active";

// ============ Wallets ============

export class PgWalletRepository implements WalletRepository {
  constructor(private query: QueryFn) {}

  async get(address: Address): Promise<WalletRecord | null> {
    const result = await this.query<WalletRow>(
      `SELECT ${WALLET_COLUMNS} FROM wallets WHERE address = $1`,
      [address]
    );
    const row = result.rows[0];
    return row ? toWallet(row) : null;
  }

  async getOrCreate(address: Address, now: number): Promise<WalletRecord> {
    // No-op update so RETURNING yields the row on conflict too
    const result = await this.query<WalletRow>(
      `INSERT INTO wallets (address, created_at)
       VALUES ($1, $2)
       ON CONFLICT (address) DO UPDATE SET address = EXCLUDED.address
       RETURNING ${WALLET_COLUMNS}`,
      [address, new Date(now)]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Failed to upsert wallet ${address}`);
    }
    return toWallet(row);
  }

  async recordLogin(address: Address, at: number): Promise<void> {
    await this.query(`UPDATE wallets SET last_login_at = $2 WHERE address = $1`, [
      address,
      new Date(at),
    ]);
  }

  async updateEnsProfile(address: Address, ensName: string | null, ensAvatar: string | null): Promise<void> {
    await this.query(`UPDATE wallets SET ens_name = $2, ens_avatar = $3 WHERE address = $1`, [
      address,
      ensName,
      ensAvatar,
    ]);
  }

  async setActive(address: Address, isActive: boolean): Promise<void> {
    await this.query(`UPDATE wallets SET is_active = $2 WHERE address = $1`, [address, isActive]);
  }
}

// ============ Groups ============

export class PgGroupRepository implements GroupRepository {
  constructor(private query: QueryFn) {}

  async ensureGroup(name: string): Promise<void> {
    await this.query(`INSERT INTO auth_groups (name) VALUES ($1) ON CONFLICT (name) DO NOTHING`, [name]);
  }

  async listGroups(address: Address): Promise<string[]> {
    const result = await this.query<{ group_name: string }>(
      `SELECT group_name FROM wallet_groups WHERE address = $1 ORDER BY group_name`,
      [address]
    );
    return result.rows.map((row) => row.group_name);
  }

  async addMember(name: string, address: Address): Promise<void> {
    await this.query(
      `INSERT INTO wallet_groups (group_name, address) VALUES ($1, $2)
       ON CONFLICT (group_name, address) DO NOTHING`,
      [name, address]
    );
  }

  async removeMember(name: string, address: Address): Promise<void> {
    await this.query(`DELETE FROM wallet_groups WHERE group_name = $1 AND address = $2`, [name, address]);
  }
}

// ============ Nonces ============

export class PgNonceRepository implements NonceRepository {
  constructor(private query: QueryFn) {}

  async insert(record: NonceRecord): Promise<void> {
    await this.query(
      `INSERT INTO nonces (value, issued_at, expires_at, consumed_at) VALUES ($1, $2, $3, $4)`,
      [
        record.nonce,
        new Date(record.issuedAt),
        new Date(record.expiresAt),
        record.consumedAt === null ? null : new Date(record.consumedAt),
      ]
    );
  }

  async take(nonce: string, at: number): Promise<NonceRecord | null> {
    // Row lock on UPDATE: only one concurrent caller sees consumed_at IS NULL
    const result = await this.query<NonceRow>(
      `UPDATE nonces SET consumed_at = $2
       WHERE value = $1 AND consumed_at IS NULL
       RETURNING value, issued_at, expires_at, consumed_at`,
      [nonce, new Date(at)]
    );
    const row = result.rows[0];
    return row ? toNonce(row) : null;
  }

  async purgeExpired(now: number): Promise<number> {
    const result = await this.query(`DELETE FROM nonces WHERE expires_at <= $1`, [new Date(now)]);
    return result.rowCount ?? 0;
  }
}

// ============ Sessions ============

export class PgSessionRepository implements SessionRepository {
  constructor(private query: QueryFn) {}

  async insert(record: SessionRecord): Promise<void> {
    await this.query(
      `INSERT INTO sessions (id, address, created_at, expires_at, rotation) VALUES ($1, $2, $3, $4, $5)`,
      [record.id, record.address, new Date(record.createdAt), new Date(record.expiresAt), record.rotation]
    );
  }

  async get(id: string): Promise<SessionRecord | null> {
    const result = await this.query<SessionRow>(
      `SELECT id, address, created_at, expires_at, rotation FROM sessions WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toSession(row) : null;
  }

  async rotate(oldId: string, next: SessionRecord): Promise<boolean> {
    const result = await this.query<{ id: string }>(
      `WITH old AS (DELETE FROM sessions WHERE id = $1 RETURNING id)
       INSERT INTO sessions (id, address, created_at, expires_at, rotation)
       SELECT $2::varchar, $3::varchar, $4::timestamptz, $5::timestamptz, $6::int FROM old
       RETURNING id`,
      [
        oldId,
        next.id,
        next.address,
        new Date(next.createdAt),
        new Date(next.expiresAt),
        next.rotation,
      ]
    );
    return result.rows.length === 1;
  }

  async delete(id: string): Promise<void> {
    await this.query(`DELETE FROM sessions WHERE id = $1`, [id]);
  }

  async purgeExpired(now: number): Promise<number> {
    const result = await this.query(`DELETE FROM sessions WHERE expires_at <= $1`, [new Date(now)]);
    return result.rowCount ?? 0;
  }
}

/**
 * PostgreSQL-backed storage. `close` ends the pool.
 */
export class PgStorage implements AuthStorage {
  readonly kind = "postgres";
  readonly wallets: PgWalletRepository;
  readonly groups: PgGroupRepository;
  readonly nonces: PgNonceRepository;
  readonly sessions: PgSessionRepository;

  constructor(
    query: QueryFn,
    private onClose: () => Promise<void> = async () => {}
  ) {
    this.wallets = new PgWalletRepository(query);
    this.groups = new PgGroupRepository(query);
    this.nonces = new PgNonceRepository(query);
    this.sessions = new PgSessionRepository(query);
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
