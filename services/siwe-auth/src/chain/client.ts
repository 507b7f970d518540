import { createPublicClient, http, type PublicClient } from "viem";
import { mainnet } from "viem/chains";
import type { ChainServiceConfig } from "./types.js";

/**
 * Public client over the configured provider URL.
 * Mainnet chain metadata supplies the ENS universal resolver; plain
 * contract reads work against whatever network the URL serves.
 */
export function createChainClient(config: ChainServiceConfig): PublicClient {
  return createPublicClient({
    chain: mainnet,
    transport: http(config.rpcUrl, {
      timeout: config.timeoutMs,
      retryCount: 1,
    }),
  });
}
