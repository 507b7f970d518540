import type { PublicClient } from "viem";
import { normalize } from "viem/ens";
import type { Address } from "@walletgate/shared";
import type { EnsProfile, EnsResolver } from "./types.js";

/**
 * Reverse-resolves addresses to their primary ENS name and avatar
 */
export class EnsService implements EnsResolver {
  constructor(private client: PublicClient) {}

  async resolve(address: Address): Promise<EnsProfile | null> {
    const name = await this.client.getEnsName({ address });
    if (!name) return null;

    const avatar = await this.client.getEnsAvatar({ name: normalize(name) });
    return { name, avatar };
  }
}
