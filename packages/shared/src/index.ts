// @walletgate/shared - Common types, config, and utilities
export const VERSION = "0.1.0";

// Types
export type {
  AppEnv,
  Address,
  AuthEnvConfig,
  DbConfig,
  GroupRemovalMode,
  GroupRuleSpec,
} from "./types.js";

export { ENV_VARS } from "./types.js";

// Auth config
export {
  getAuthEnvConfig,
  validateAuthConfigEnv,
  clearAuthConfigCache,
  parseGroupRules,
  isValidAddress,
  ConfigurationError,
} from "./authConfig.js";
