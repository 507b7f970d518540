import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { QueryResultRow } from "pg";
import type { Address } from "@walletgate/shared";
import { MemoryStorage } from "./memoryStore.js";
import { PgStorage } from "./postgresStore.js";
import type { QueryFn } from "./pool.js";
import { findSchemaFile } from "./schemaPath.js";

const WALLET = "0x1234567890123456789012345678901234567890" as Address;
const T0 = 1_700_000_000_000;

interface RecordedQuery {
  text: string;
  params: unknown[];
}

/**
 * QueryFn that records every statement and answers from a queue of rows
 */
function recordingQuery(): { query: QueryFn; queries: RecordedQuery[]; respond: (rows: object[], rowCount?: number) => void } {
  const queries: RecordedQuery[] = [];
  const responses: Array<{ rows: object[]; rowCount: number }> = [];

  const query = async <T extends QueryResultRow>(text: string, params: unknown[] = []) => {
    queries.push({ text: text.replace(/\s+/g, " ").trim(), params });
    const next = responses.shift() ?? { rows: [], rowCount: 0 };
    return {
      command: "",
      oid: 0,
      fields: [],
      rows: next.rows as T[],
      rowCount: next.rowCount,
    };
  };

  return {
    query,
    queries,
    respond: (rows, rowCount = rows.length) => {
      responses.push({ rows, rowCount });
    },
  };
}

describe("MemoryStorage", () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  it("creates a wallet once", async () => {
    const first = await storage.wallets.getOrCreate(WALLET, T0);
    const second = await storage.wallets.getOrCreate(WALLET, T0 + 1000);
    assert.equal(first.createdAt, T0);
    assert.equal(second.createdAt, T0);
    assert.equal(second.isActive, true);
    assert.equal(storage.wallets.size(), 1);
  });

  it("returns copies of wallet records", async () => {
    const wallet = await storage.wallets.getOrCreate(WALLET, T0);
    wallet.isActive = false;
    assert.equal((await storage.wallets.get(WALLET))?.isActive, true);
  });

  it("lists groups sorted and ignores duplicate adds", async () => {
    await storage.groups.addMember("zeta", WALLET);
    await storage.groups.addMember("alpha", WALLET);
    await storage.groups.addMember("alpha", WALLET);
    assert.deepEqual(await storage.groups.listGroups(WALLET), ["alpha", "zeta"]);

    await storage.groups.removeMember("zeta", WALLET);
    assert.deepEqual(await storage.groups.listGroups(WALLET), ["alpha"]);
    assert.deepEqual(storage.groups.names(), ["alpha", "zeta"]);
  });

  it("rotate fails once the old session is gone", async () => {
    const record = { id: "s1", address: WALLET, createdAt: T0, expiresAt: T0 + 1000, rotation: 0 };
    await storage.sessions.insert(record);

    assert.equal(await storage.sessions.rotate("s1", { ...record, id: "s2", rotation: 1 }), true);
    assert.equal(await storage.sessions.rotate("s1", { ...record, id: "s3", rotation: 1 }), false);
    assert.equal((await storage.sessions.get("s2"))?.rotation, 1);
    assert.equal(await storage.sessions.get("s3"), null);
  });
});

describe("PgStorage", () => {
  it("upserts wallets and maps rows", async () => {
    const { query, queries, respond } = recordingQuery();
    const storage = new PgStorage(query);
    respond([
      {
        address: WALLET,
        created_at: new Date(T0),
        last_login_at: null,
        ens_name: "alice.eth",
        ens_avatar: null,
        is_active: true,
      },
    ]);

    const wallet = await storage.wallets.getOrCreate(WALLET, T0);

    assert.deepEqual(wallet, {
      address: WALLET,
      createdAt: T0,
      lastLoginAt: null,
      ensName: "alice.eth",
      ensAvatar: null,
      isActive: true,
    });
    assert.ok(queries[0]?.text.startsWith("INSERT INTO wallets (address, created_at) VALUES ($1, $2) ON CONFLICT"));
    assert.deepEqual(queries[0]?.params, [WALLET, new Date(T0)]);
  });

  it("rejects rows with an invalid address", async () => {
    const { query, respond } = recordingQuery();
    const storage = new PgStorage(query);
    respond([
      {
        address: "garbage",
        created_at: new Date(T0),
        last_login_at: null,
        ens_name: null,
        ens_avatar: null,
        is_active: true,
      },
    ]);

    await assert.rejects(storage.wallets.get(WALLET), { message: "Invalid address in database row: garbage" });
  });

  it("takes a nonce with a single conditional update", async () => {
    const { query, queries, respond } = recordingQuery();
    const storage = new PgStorage(query);
    respond([
      {
        value: "2483e73d0aa1",
        issued_at: new Date(T0),
        expires_at: new Date(T0 + 600_000),
        consumed_at: new Date(T0 + 5000),
      },
    ]);

    const record = await storage.nonces.take("2483e73d0aa1", T0 + 5000);

    assert.deepEqual(record, {
      nonce: "2483e73d0aa1",
      issuedAt: T0,
      expiresAt: T0 + 600_000,
      consumedAt: T0 + 5000,
    });
    assert.equal(queries.length, 1);
    assert.ok(queries[0]?.text.includes("WHERE value = $1 AND consumed_at IS NULL"));
  });

  it("returns null when the nonce was already taken", async () => {
    const { query } = recordingQuery();
    const storage = new PgStorage(query);
    assert.equal(await storage.nonces.take("2483e73d0aa1", T0), null);
  });

  it("reports purged row counts", async () => {
    const { query, queries, respond } = recordingQuery();
    const storage = new PgStorage(query);
    respond([], 3);

    assert.equal(await storage.sessions.purgeExpired(T0), 3);
    assert.equal(queries[0]?.text, "DELETE FROM sessions WHERE expires_at <= $1");
    assert.deepEqual(queries[0]?.params, [new Date(T0)]);
  });

  it("rotate reports whether the old session existed", async () => {
    const { query, queries, respond } = recordingQuery();
    const storage = new PgStorage(query);
    const next = { id: "s2", address: WALLET, createdAt: T0, expiresAt: T0 + 1000, rotation: 1 };

    respond([{ id: "s2" }]);
    assert.equal(await storage.sessions.rotate("s1", next), true);
    assert.equal(await storage.sessions.rotate("s1", next), false);
    assert.deepEqual(queries[0]?.params, ["s1", "s2", WALLET, new Date(T0), new Date(T0 + 1000), 1]);
  });

  it("lists groups in order from the database", async () => {
    const { query, queries, respond } = recordingQuery();
    const storage = new PgStorage(query);
    respond([{ group_name: "alpha" }, { group_name: "zeta" }]);

    assert.deepEqual(await storage.groups.listGroups(WALLET), ["alpha", "zeta"]);
    assert.equal(queries[0]?.text, "SELECT group_name FROM wallet_groups WHERE address = $1 ORDER BY group_name");
  });

  it("close runs the close callback", async () => {
    let closed = false;
    const storage = new PgStorage(recordingQuery().query, async () => {
      closed = true;
    });
    await storage.close();
    assert.equal(closed, true);
  });
});

describe("findSchemaFile", () => {
  const built = path.join("/srv", "app", "dist", "services", "siwe-auth", "src", "storage");
  const source = path.join("/srv", "app", "services", "siwe-auth", "src", "storage", "schema.sql");

  it("finds the schema beside the sources", () => {
    const dir = path.dirname(fileURLToPath(import.meta.url));
    assert.equal(findSchemaFile(dir), path.join(dir, "schema.sql"));
  });

  it("falls back to the source tree from a build under dist", () => {
    assert.equal(findSchemaFile(built, (file) => file === source), source);
  });

  it("names both paths when neither exists", () => {
    assert.throws(() => findSchemaFile(built, () => false), {
      message: `Schema file not found at ${path.join(built, "schema.sql")} or ${source}`,
    });
  });
});
