export { ChainService, ChainError } from "./chainService.js";
export { EnsService } from "./ensService.js";
export { createChainClient } from "./client.js";
export { withTimeout } from "./timeout.js";
export type { ChainDataProvider, ChainServiceConfig, EnsProfile, EnsResolver } from "./types.js";
