import type { AbiFunction } from "viem";
import { ConfigurationError, isValidAddress, type Address } from "@walletgate/shared";
import { ChainError } from "../chain/chainService.js";
import type { ChainDataProvider } from "../chain/types.js";
import { ERC1155BalanceOf, ERC20BalanceOf, ERC721BalanceOf } from "./tokenAbis.js";
import type { GroupManager, WalletRef } from "./types.js";

export type UintInput = bigint | number | string;

export interface TokenOwnerConfig {
  contract: string;
  /** Minimum balance for membership (default 1) */
  minBalance?: UintInput;
}

export interface ERC1155OwnerConfig extends TokenOwnerConfig {
  tokenId: UintInput;
}

function toUint(value: UintInput, what: string): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) throw new ConfigurationError(`${what} must be a non-negative integer`);
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new ConfigurationError(`${what} must be a non-negative integer`);
    }
    return BigInt(value);
  }
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${what} must be a non-negative integer`);
  }
  return BigInt(value);
}

/**
 * Shared config handling and the balance comparison for token standards
 */
abstract class TokenOwnerManager implements GroupManager {
  readonly contract: Address;
  readonly minBalance: bigint;

  constructor(
    config: TokenOwnerConfig,
    protected standard: string
  ) {
    if (!config.contract) {
      throw new ConfigurationError(`${standard} owner manager config is missing contract`);
    }
    if (!isValidAddress(config.contract)) {
      throw new ConfigurationError(`${standard} owner manager has an invalid contract address: ${config.contract}`);
    }
    this.contract = config.contract;

    this.minBalance =
      config.minBalance === undefined ? 1n : toUint(config.minBalance, `${standard} minBalance`);
    if (this.minBalance < 1n) {
      throw new ConfigurationError(`${standard} minBalance must be at least 1`);
    }
  }

  protected abstract balanceOf(owner: Address, provider: ChainDataProvider): Promise<bigint>;

  async isMember(wallet: WalletRef, provider: ChainDataProvider): Promise<boolean> {
    if (!isValidAddress(wallet.address)) return false;
    const balance = await this.balanceOf(wallet.address, provider);
    return balance >= this.minBalance;
  }

  protected async readBalance(
    provider: ChainDataProvider,
    method: AbiFunction,
    args: readonly unknown[]
  ): Promise<bigint> {
    const value = await provider.call(this.contract, method, args);
    if (typeof value !== "bigint") {
      throw new ChainError(
        `${this.standard} balanceOf on ${this.contract} returned a non-integer value`,
        "CONTRACT_ERROR"
      );
    }
    return value;
  }
}

/**
 * Member iff balanceOf(owner) >= minBalance on an ERC-20 contract
 */
export class ERC20OwnerManager extends TokenOwnerManager {
  constructor(config: TokenOwnerConfig) {
    super(config, "ERC20");
  }

  protected balanceOf(owner: Address, provider: ChainDataProvider): Promise<bigint> {
    return this.readBalance(provider, ERC20BalanceOf, [owner]);
  }
}

/**
 * Member iff the wallet owns at least minBalance tokens of an ERC-721 collection
 */
export class ERC721OwnerManager extends TokenOwnerManager {
  constructor(config: TokenOwnerConfig) {
    super(config, "ERC721");
  }

  protected balanceOf(owner: Address, provider: ChainDataProvider): Promise<bigint> {
    return this.readBalance(provider, ERC721BalanceOf, [owner]);
  }
}

/**
 * Member iff balanceOf(owner, tokenId) >= minBalance on an ERC-1155 contract
 */
export class ERC1155OwnerManager extends TokenOwnerManager {
  readonly tokenId: bigint;

  constructor(config: ERC1155OwnerConfig) {
    super(config, "ERC1155");
    if (config.tokenId === undefined) {
      throw new ConfigurationError("ERC1155 owner manager config is missing tokenId");
    }
    this.tokenId = toUint(config.tokenId, "ERC1155 tokenId");
  }

  protected balanceOf(owner: Address, provider: ChainDataProvider): Promise<bigint> {
    return this.readBalance(provider, ERC1155BalanceOf, [owner, this.tokenId]);
  }
}
