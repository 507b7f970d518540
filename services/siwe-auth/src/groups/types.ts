import type { Address } from "@walletgate/shared";
import type { ChainDataProvider } from "../chain/types.js";

/**
 * The wallet a membership check runs for
 */
export interface WalletRef {
  address: Address;
}

/**
 * Membership strategy.
 * Implementations may read chain state through `provider`; a thrown error
 * leaves the group's membership unchanged.
 */
export interface GroupManager {
  isMember(wallet: WalletRef, provider: ChainDataProvider): Promise<boolean>;
}

/**
 * A group name bound to the strategy that decides it
 */
export interface GroupBinding {
  name: string;
  manager: GroupManager;
}

export interface GroupSyncFailure {
  group: string;
  code: "CHAIN_PROVIDER_UNAVAILABLE";
  message: string;
}

/**
 * Outcome of one sync. Every bound group appears in exactly one of
 * added / removed / unchanged / failed.
 */
export interface GroupSyncResult {
  added: string[];
  removed: string[];
  unchanged: string[];
  failed: GroupSyncFailure[];
  /** Wallet's full group set after the sync, sorted */
  groups: string[];
}
