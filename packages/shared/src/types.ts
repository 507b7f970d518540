// @walletgate/shared - Type definitions

/**
 * Deployment environments
 */
export type AppEnv = "local" | "production";

/**
 * Hex address type (0x-prefixed, 42 characters)
 */
export type Address = `0x${string}`;

/**
 * Whether a failed membership check removes an existing membership
 */
export type GroupRemovalMode = "eager" | "additive";

/**
 * Declarative group rule, as read from SIWE_CUSTOM_GROUPS
 */
export type GroupRuleSpec =
  | {
      name: string;
      type: "erc20" | "erc721";
      contract: Address;
      minBalance?: string;
    }
  | {
      name: string;
      type: "erc1155";
      contract: Address;
      tokenId: string;
      minBalance?: string;
    }
  | {
      name: string;
      type: "allowlist";
      addresses: Address[];
    };

/**
 * PostgreSQL connection settings
 */
export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max?: number;
}

/**
 * Auth service configuration loaded from the environment.
 * Optional numeric fields fall back to the service defaults.
 */
export interface AuthEnvConfig {
  env: AppEnv;
  providerUrl: string;
  domain: string;
  uri?: string;
  jwtSecret: string;
  csrfExempt: boolean;
  groupsOnAuth: boolean;
  ensProfileOnAuth: boolean;
  customGroups: GroupRuleSpec[];
  groupRemoval: GroupRemovalMode;
  sessionTtlMs?: number;
  sessionMaxAgeMs?: number;
  nonceTtlMs?: number;
  clockSkewMs?: number;
  chainTimeoutMs?: number;
  cookieName?: string;
  secureCookies: boolean;
  allowedOrigins: string[];
  /** Present when DB_HOST is set; in-memory storage otherwise */
  database?: DbConfig;
}

/**
 * Environment variable names for auth config
 */
export const ENV_VARS = {
  APP_ENV: "APP_ENV",
  PORT: "PORT",

  // SIWE
  SIWE_PROVIDER_URL: "SIWE_PROVIDER_URL",
  SIWE_DOMAIN: "SIWE_DOMAIN",
  SIWE_URI: "SIWE_URI",
  SIWE_CLOCK_SKEW_MS: "SIWE_CLOCK_SKEW_MS",
  SIWE_CSRF_EXEMPT: "SIWE_CSRF_EXEMPT",
  NONCE_TTL_MS: "NONCE_TTL_MS",

  // Groups and ENS
  SIWE_GROUPS_ON_AUTH: "SIWE_GROUPS_ON_AUTH",
  SIWE_ENS_PROFILE_ON_AUTH: "SIWE_ENS_PROFILE_ON_AUTH",
  SIWE_CUSTOM_GROUPS: "SIWE_CUSTOM_GROUPS",
  SIWE_GROUP_REMOVAL: "SIWE_GROUP_REMOVAL",
  CHAIN_TIMEOUT_MS: "CHAIN_TIMEOUT_MS",

  // Sessions
  SESSION_SECRET: "SESSION_SECRET",
  SESSION_TTL_MS: "SESSION_TTL_MS",
  SESSION_MAX_AGE_MS: "SESSION_MAX_AGE_MS",
  SESSION_COOKIE_NAME: "SESSION_COOKIE_NAME",
  SESSION_COOKIE_SECURE: "SESSION_COOKIE_SECURE",
  CORS_ALLOWED_ORIGINS: "CORS_ALLOWED_ORIGINS",

  // Database
  DB_HOST: "DB_HOST",
  DB_PORT: "DB_PORT",
  DB_NAME: "DB_NAME",
  DB_USER: "DB_USER",
  DB_PASSWORD: "DB_PASSWORD",
  DB_POOL_SIZE: "DB_POOL_SIZE",
} as const;
