import { ConfigurationError, isValidAddress } from "@walletgate/shared";
import type { ChainDataProvider } from "../chain/types.js";
import type { GroupManager, WalletRef } from "./types.js";

/**
 * Static allowlist. No chain reads.
 */
export class AddressListManager implements GroupManager {
  private addresses: Set<string>;

  constructor(addresses: readonly string[]) {
    for (const address of addresses) {
      if (!isValidAddress(address)) {
        throw new ConfigurationError(`Allowlist contains an invalid address: ${address}`);
      }
    }
    this.addresses = new Set(addresses.map((address) => address.toLowerCase()));
  }

  async isMember(wallet: WalletRef, _provider: ChainDataProvider): Promise<boolean> {
    return this.addresses.has(wallet.address.toLowerCase());
  }
}
