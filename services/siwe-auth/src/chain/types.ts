import type { AbiFunction } from "viem";
import type { Address } from "@walletgate/shared";

/**
 * Read-only access to on-chain state
 */
export interface ChainDataProvider {
  /**
   * Call a view function
   * @param method - ABI fragment of the function to call
   */
  call(contract: Address, method: AbiFunction, args: readonly unknown[]): Promise<unknown>;
}

/**
 * Primary ENS name of an address, with its avatar record
 */
export interface EnsProfile {
  name: string;
  avatar: string | null;
}

export interface EnsResolver {
  resolve(address: Address): Promise<EnsProfile | null>;
}

/**
 * Configuration for chain service
 */
export interface ChainServiceConfig {
  rpcUrl: string;
  /** HTTP request timeout in milliseconds */
  timeoutMs?: number;
}
