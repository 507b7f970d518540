// @walletgate/shared - Auth configuration system
// No hardcoded endpoints or secrets - all values loaded from environment

import {
  type AppEnv,
  type Address,
  type AuthEnvConfig,
  type DbConfig,
  type GroupRemovalMode,
  type GroupRuleSpec,
  ENV_VARS,
} from "./types.js";

/** Minimum HS256 secret length */
const MIN_SECRET_LENGTH = 32;

/**
 * Error thrown when required configuration is missing or invalid.
 * Fatal at startup, never raised per request.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly missingVars?: string[]
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Validates that a string is a valid Ethereum address
 */
export function isValidAddress(value: string): value is Address {
  return /^0x[a-fA-F0-9]{40}$/.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Gets an environment variable or throws if missing
 */
function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`, [name]);
  }
  return value;
}

function optionalBoolean(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  throw new ConfigurationError(`Invalid boolean for ${name}: "${value}" - use true or false`);
}

function optionalPositiveInt(name: string): number | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Invalid value for ${name}: "${value}" - must be a positive integer`);
  }
  return parsed;
}

function parseAppEnv(value: string | undefined): AppEnv {
  if (!value) return "local";
  if (value === "local" || value === "production") {
    return value;
  }
  throw new ConfigurationError(`Invalid APP_ENV: "${value}" - must be one of: local, production`);
}

function parseGroupRemoval(value: string | undefined): GroupRemovalMode {
  if (!value) return "eager";
  if (value === "eager" || value === "additive") {
    return value;
  }
  throw new ConfigurationError(
    `Invalid ${ENV_VARS.SIWE_GROUP_REMOVAL}: "${value}" - must be one of: eager, additive`
  );
}

function parseUint(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return String(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return value;
  }
  throw new ConfigurationError(`${field} must be a non-negative integer`);
}

function parseRuleAddress(value: unknown, field: string): Address {
  if (typeof value !== "string" || !isValidAddress(value)) {
    throw new ConfigurationError(
      `Invalid address for ${field}: "${String(value)}" - must be 0x-prefixed 40 hex characters`
    );
  }
  return value;
}

/**
 * Parses the SIWE_CUSTOM_GROUPS JSON document into group rules.
 *
 * Each entry names a group and the rule that decides membership, e.g.
 * `{ "name": "usdt_owners", "type": "erc20", "contract": "0x..." }`.
 */
export function parseGroupRules(raw: string): GroupRuleSpec[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`${ENV_VARS.SIWE_CUSTOM_GROUPS} is not valid JSON`);
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigurationError(`${ENV_VARS.SIWE_CUSTOM_GROUPS} must be a JSON array`);
  }

  const seen = new Set<string>();
  return parsed.map((entry, index): GroupRuleSpec => {
    const where = `${ENV_VARS.SIWE_CUSTOM_GROUPS}[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${where} must be an object`);
    }
    const { name, type } = entry;
    if (typeof name !== "string" || name.trim() === "") {
      throw new ConfigurationError(`${where}.name is required`);
    }
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate group name "${name}" in ${ENV_VARS.SIWE_CUSTOM_GROUPS}`);
    }
    seen.add(name);

    switch (type) {
      case "erc20":
      case "erc721":
        return {
          name,
          type,
          contract: parseRuleAddress(entry.contract, `${where}.contract`),
          minBalance: parseUint(entry.minBalance, `${where}.minBalance`),
        };
      case "erc1155": {
        const tokenId = parseUint(entry.tokenId, `${where}.tokenId`);
        if (tokenId === undefined) {
          throw new ConfigurationError(`${where}.tokenId is required for erc1155 rules`);
        }
        return {
          name,
          type,
          contract: parseRuleAddress(entry.contract, `${where}.contract`),
          tokenId,
          minBalance: parseUint(entry.minBalance, `${where}.minBalance`),
        };
      }
      case "allowlist": {
        if (!Array.isArray(entry.addresses)) {
          throw new ConfigurationError(`${where}.addresses must be an array`);
        }
        return {
          name,
          type,
          addresses: entry.addresses.map((address, i) =>
            parseRuleAddress(address, `${where}.addresses[${i}]`)
          ),
        };
      }
      default:
        throw new ConfigurationError(
          `${where}.type must be one of: erc20, erc721, erc1155, allowlist (got: "${String(type)}")`
        );
    }
  });
}

/**
 * Loads database settings. Returns undefined when DB_HOST is not set.
 */
function loadDbConfig(): DbConfig | undefined {
  if (!process.env[ENV_VARS.DB_HOST]) return undefined;

  const missingVars = [ENV_VARS.DB_NAME, ENV_VARS.DB_USER, ENV_VARS.DB_PASSWORD].filter(
    (name) => !process.env[name]
  );
  if (missingVars.length > 0) {
    throw new ConfigurationError(
      `Database configuration incomplete. Missing: ${missingVars.join(", ")}`,
      missingVars
    );
  }

  return {
    host: requireEnv(ENV_VARS.DB_HOST),
    port: optionalPositiveInt(ENV_VARS.DB_PORT) ?? 5432,
    database: requireEnv(ENV_VARS.DB_NAME),
    user: requireEnv(ENV_VARS.DB_USER),
    password: requireEnv(ENV_VARS.DB_PASSWORD),
    max: optionalPositiveInt(ENV_VARS.DB_POOL_SIZE) ?? 10,
  };
}

/**
 * Cached config instance
 */
let cachedConfig: AuthEnvConfig | null = null;

/**
 * Loads the auth configuration from environment variables.
 *
 * Required environment variables:
 * - SIWE_PROVIDER_URL: chain RPC endpoint used for membership checks and ENS
 * - SIWE_DOMAIN: domain that SIWE messages must be bound to
 * - SESSION_SECRET: session signing secret (min 32 characters)
 * - DB_HOST and friends: required when APP_ENV=production
 *
 * @param forceReload - If true, ignores cached config and reloads from environment
 * @throws ConfigurationError if configuration is missing or invalid
 */
export function getAuthEnvConfig(forceReload = false): AuthEnvConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  const env = parseAppEnv(process.env[ENV_VARS.APP_ENV]);
  const providerUrl = requireEnv(ENV_VARS.SIWE_PROVIDER_URL);
  const domain = requireEnv(ENV_VARS.SIWE_DOMAIN);
  const jwtSecret = requireEnv(ENV_VARS.SESSION_SECRET);

  if (jwtSecret.length < MIN_SECRET_LENGTH) {
    throw new ConfigurationError(
      `${ENV_VARS.SESSION_SECRET} must be at least ${MIN_SECRET_LENGTH} characters`
    );
  }

  const database = loadDbConfig();
  if (env === "production" && !database) {
    throw new ConfigurationError(
      `Database configuration required for production environment.\n` +
        `Set ${ENV_VARS.DB_HOST}, ${ENV_VARS.DB_NAME}, ${ENV_VARS.DB_USER}, ${ENV_VARS.DB_PASSWORD}.`,
      [ENV_VARS.DB_HOST]
    );
  }

  const rawGroups = process.env[ENV_VARS.SIWE_CUSTOM_GROUPS];

  cachedConfig = {
    env,
    providerUrl,
    domain,
    uri: process.env[ENV_VARS.SIWE_URI] || undefined,
    jwtSecret,
    csrfExempt: optionalBoolean(ENV_VARS.SIWE_CSRF_EXEMPT, false),
    groupsOnAuth: optionalBoolean(ENV_VARS.SIWE_GROUPS_ON_AUTH, false),
    ensProfileOnAuth: optionalBoolean(ENV_VARS.SIWE_ENS_PROFILE_ON_AUTH, true),
    customGroups: rawGroups ? parseGroupRules(rawGroups) : [],
    groupRemoval: parseGroupRemoval(process.env[ENV_VARS.SIWE_GROUP_REMOVAL]),
    sessionTtlMs: optionalPositiveInt(ENV_VARS.SESSION_TTL_MS),
    sessionMaxAgeMs: optionalPositiveInt(ENV_VARS.SESSION_MAX_AGE_MS),
    nonceTtlMs: optionalPositiveInt(ENV_VARS.NONCE_TTL_MS),
    clockSkewMs: optionalPositiveInt(ENV_VARS.SIWE_CLOCK_SKEW_MS),
    chainTimeoutMs: optionalPositiveInt(ENV_VARS.CHAIN_TIMEOUT_MS),
    cookieName: process.env[ENV_VARS.SESSION_COOKIE_NAME] || undefined,
    secureCookies: optionalBoolean(ENV_VARS.SESSION_COOKIE_SECURE, env === "production"),
    allowedOrigins: (process.env[ENV_VARS.CORS_ALLOWED_ORIGINS] || "")
      .split(",")
      .map((value) => value.trim())
      .filter(Boolean),
    database,
  };

  return cachedConfig;
}

/**
 * Returns the required variables that are not set, or an empty array.
 * Does not throw - useful for startup validation with custom error handling.
 */
export function validateAuthConfigEnv(): string[] {
  const requiredVars: string[] = [
    ENV_VARS.SIWE_PROVIDER_URL,
    ENV_VARS.SIWE_DOMAIN,
    ENV_VARS.SESSION_SECRET,
  ];
  if (process.env[ENV_VARS.APP_ENV] === "production") {
    requiredVars.push(ENV_VARS.DB_HOST, ENV_VARS.DB_NAME, ENV_VARS.DB_USER, ENV_VARS.DB_PASSWORD);
  }
  return requiredVars.filter((name) => !process.env[name]);
}

/**
 * Clears the cached configuration.
 * Useful for testing or when environment variables change.
 */
export function clearAuthConfigCache(): void {
  cachedConfig = null;
}
