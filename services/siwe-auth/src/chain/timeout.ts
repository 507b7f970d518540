import { ChainError } from "./chainService.js";

/**
 * Reject with CHAIN_PROVIDER_UNAVAILABLE if `promise` has not settled within `ms`
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ChainError(message, "CHAIN_PROVIDER_UNAVAILABLE")), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
