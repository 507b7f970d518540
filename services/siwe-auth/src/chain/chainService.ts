import type { AbiFunction, PublicClient } from "viem";
import type { Address } from "@walletgate/shared";
import type { ChainDataProvider } from "./types.js";

/**
 * Error thrown when chain operations fail
 */
export class ChainError extends Error {
  constructor(
    message: string,
    public code: "CHAIN_PROVIDER_UNAVAILABLE" | "CONTRACT_ERROR"
  ) {
    super(message);
    this.name = "ChainError";
  }
}

/**
 * Service for on-chain data retrieval
 */
export class ChainService implements ChainDataProvider {
  constructor(private client: PublicClient) {}

  async call(contract: Address, method: AbiFunction, args: readonly unknown[]): Promise<unknown> {
    try {
      return await this.client.readContract({
        address: contract,
        abi: [method],
        functionName: method.name,
        args,
      });
    } catch (err) {
      throw new ChainError(
        `Failed to call ${method.name} on ${contract}: ${err instanceof Error ? err.message : String(err)}`,
        "CHAIN_PROVIDER_UNAVAILABLE"
      );
    }
  }
}
