export { GroupMembershipEngine, type GroupSyncOptions } from "./groupSync.js";
export {
  ERC20OwnerManager,
  ERC721OwnerManager,
  ERC1155OwnerManager,
  type ERC1155OwnerConfig,
  type TokenOwnerConfig,
  type UintInput,
} from "./tokenOwnerManagers.js";
export { AddressListManager } from "./addressListManager.js";
export { createGroupBindings } from "./fromRules.js";
export { ERC20BalanceOf, ERC721BalanceOf, ERC1155BalanceOf } from "./tokenAbis.js";
export type { GroupBinding, GroupManager, GroupSyncFailure, GroupSyncResult, WalletRef } from "./types.js";
