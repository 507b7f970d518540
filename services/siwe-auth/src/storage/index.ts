export type {
  AuthStorage,
  GroupRepository,
  NonceRepository,
  SessionRepository,
  WalletRecord,
  WalletRepository,
} from "./types.js";
export {
  MemoryStorage,
  MemoryWalletRepository,
  MemoryGroupRepository,
  MemoryNonceRepository,
  MemorySessionRepository,
} from "./memoryStore.js";
export {
  PgStorage,
  PgWalletRepository,
  PgGroupRepository,
  PgNonceRepository,
  PgSessionRepository,
} from "./postgresStore.js";
export { getPool, closePool, poolQuery, type QueryFn } from "./pool.js";
