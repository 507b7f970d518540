import { ConfigurationError, type GroupRuleSpec } from "@walletgate/shared";
import { AddressListManager } from "./addressListManager.js";
import { ERC1155OwnerManager, ERC20OwnerManager, ERC721OwnerManager } from "./tokenOwnerManagers.js";
import type { GroupBinding, GroupManager } from "./types.js";

function managerFor(rule: GroupRuleSpec): GroupManager {
  switch (rule.type) {
    case "erc20":
      return new ERC20OwnerManager({ contract: rule.contract, minBalance: rule.minBalance });
    case "erc721":
      return new ERC721OwnerManager({ contract: rule.contract, minBalance: rule.minBalance });
    case "erc1155":
      return new ERC1155OwnerManager({
        contract: rule.contract,
        tokenId: rule.tokenId,
        minBalance: rule.minBalance,
      });
    case "allowlist":
      return new AddressListManager(rule.addresses);
  }
}

/**
 * Build group bindings from declarative rules.
 * Group names must be unique.
 */
export function createGroupBindings(rules: readonly GroupRuleSpec[]): GroupBinding[] {
  const seen = new Set<string>();
  return rules.map((rule) => {
    if (seen.has(rule.name)) {
      throw new ConfigurationError(`Duplicate group name: ${rule.name}`);
    }
    seen.add(rule.name);
    return { name: rule.name, manager: managerFor(rule) };
  });
}
