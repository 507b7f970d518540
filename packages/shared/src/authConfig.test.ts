// @walletgate/shared - Auth config tests

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import {
  getAuthEnvConfig,
  validateAuthConfigEnv,
  clearAuthConfigCache,
  parseGroupRules,
  ConfigurationError,
} from "./authConfig.js";
import { ENV_VARS } from "./types.js";

const TEST_SECRET = "test-secret-key-that-is-at-least-32-characters-long";

// Helper to set all required env vars with valid test values
function setRequiredEnvVars(): void {
  process.env[ENV_VARS.SIWE_PROVIDER_URL] = "https://rpc.example.com";
  process.env[ENV_VARS.SIWE_DOMAIN] = "app.example.com";
  process.env[ENV_VARS.SESSION_SECRET] = TEST_SECRET;
}

// Helper to clear all env vars
function clearAllEnvVars(): void {
  for (const name of Object.values(ENV_VARS)) {
    delete process.env[name];
  }
}

describe("authConfig", () => {
  beforeEach(() => {
    clearAllEnvVars();
    clearAuthConfigCache();
  });

  afterEach(() => {
    clearAllEnvVars();
    clearAuthConfigCache();
  });

  describe("getAuthEnvConfig", () => {
    it("loads config with defaults when only required vars are set", () => {
      setRequiredEnvVars();

      const config = getAuthEnvConfig();

      assert.strictEqual(config.env, "local");
      assert.strictEqual(config.providerUrl, "https://rpc.example.com");
      assert.strictEqual(config.domain, "app.example.com");
      assert.strictEqual(config.uri, undefined);
      assert.strictEqual(config.csrfExempt, false);
      assert.strictEqual(config.groupsOnAuth, false);
      assert.strictEqual(config.ensProfileOnAuth, true);
      assert.strictEqual(config.groupRemoval, "eager");
      assert.strictEqual(config.secureCookies, false);
      assert.deepStrictEqual(config.customGroups, []);
      assert.deepStrictEqual(config.allowedOrigins, []);
      assert.strictEqual(config.sessionTtlMs, undefined);
      assert.strictEqual(config.database, undefined);
    });

    it("throws ConfigurationError when the provider URL is missing", () => {
      setRequiredEnvVars();
      delete process.env[ENV_VARS.SIWE_PROVIDER_URL];

      assert.throws(
        () => getAuthEnvConfig(),
        (err: Error) => {
          assert.ok(err instanceof ConfigurationError);
          assert.deepStrictEqual(err.missingVars, ["SIWE_PROVIDER_URL"]);
          return true;
        }
      );
    });

    it("rejects a short session secret", () => {
      setRequiredEnvVars();
      process.env[ENV_VARS.SESSION_SECRET] = "short";

      assert.throws(
        () => getAuthEnvConfig(),
        (err: Error) => {
          assert.ok(err instanceof ConfigurationError);
          assert.strictEqual(err.message, "SESSION_SECRET must be at least 32 characters");
          return true;
        }
      );
    });

    it("parses flags, durations and origins", () => {
      setRequiredEnvVars();
      process.env[ENV_VARS.SIWE_CSRF_EXEMPT] = "true";
      process.env[ENV_VARS.SIWE_GROUPS_ON_AUTH] = "1";
      process.env[ENV_VARS.SIWE_ENS_PROFILE_ON_AUTH] = "no";
      process.env[ENV_VARS.SIWE_GROUP_REMOVAL] = "additive";
      process.env[ENV_VARS.SESSION_TTL_MS] = "60000";
      process.env[ENV_VARS.CORS_ALLOWED_ORIGINS] = "https://a.example.com, https://b.example.com";

      const config = getAuthEnvConfig();

      assert.strictEqual(config.csrfExempt, true);
      assert.strictEqual(config.groupsOnAuth, true);
      assert.strictEqual(config.ensProfileOnAuth, false);
      assert.strictEqual(config.groupRemoval, "additive");
      assert.strictEqual(config.sessionTtlMs, 60000);
      assert.deepStrictEqual(config.allowedOrigins, [
        "https://a.example.com",
        "https://b.example.com",
      ]);
    });

    it("rejects malformed booleans and durations", () => {
      setRequiredEnvVars();
      process.env[ENV_VARS.SIWE_CSRF_EXEMPT] = "maybe";
      assert.throws(() => getAuthEnvConfig(), ConfigurationError);

      delete process.env[ENV_VARS.SIWE_CSRF_EXEMPT];
      process.env[ENV_VARS.NONCE_TTL_MS] = "-5";
      assert.throws(() => getAuthEnvConfig(true), ConfigurationError);
    });

    it("requires a database in production", () => {
      setRequiredEnvVars();
      process.env[ENV_VARS.APP_ENV] = "production";

      assert.throws(
        () => getAuthEnvConfig(),
        (err: Error) => {
          assert.ok(err instanceof ConfigurationError);
          assert.ok(err.message.includes("production"));
          return true;
        }
      );
    });

    it("loads database settings when DB_HOST is set", () => {
      setRequiredEnvVars();
      process.env[ENV_VARS.APP_ENV] = "production";
      process.env[ENV_VARS.DB_HOST] = "db.internal";
      process.env[ENV_VARS.DB_NAME] = "walletgate";
      process.env[ENV_VARS.DB_USER] = "walletgate";
      process.env[ENV_VARS.DB_PASSWORD] = "test-password";

      const config = getAuthEnvConfig();

      assert.deepStrictEqual(config.database, {
        host: "db.internal",
        port: 5432,
        database: "walletgate",
        user: "walletgate",
        password: "test-password",
        max: 10,
      });
      assert.strictEqual(config.secureCookies, true);
    });

    it("caches config and reloads on demand", () => {
      setRequiredEnvVars();

      const config1 = getAuthEnvConfig();
      const config2 = getAuthEnvConfig();
      assert.strictEqual(config1, config2);

      process.env[ENV_VARS.SIWE_PROVIDER_URL] = "https://new-rpc.example.com";
      const config3 = getAuthEnvConfig(true);
      assert.notStrictEqual(config1, config3);
      assert.strictEqual(config3.providerUrl, "https://new-rpc.example.com");
    });
  });

  describe("parseGroupRules", () => {
    it("parses token and allowlist rules", () => {
      const rules = parseGroupRules(
        JSON.stringify([
          { name: "usdt_owners", type: "erc20", contract: "0x1111111111111111111111111111111111111111" },
          {
            name: "badge_holders",
            type: "erc1155",
            contract: "0x2222222222222222222222222222222222222222",
            tokenId: 7,
            minBalance: "2",
          },
          { name: "staff", type: "allowlist", addresses: ["0x3333333333333333333333333333333333333333"] },
        ])
      );

      assert.deepStrictEqual(rules, [
        {
          name: "usdt_owners",
          type: "erc20",
          contract: "0x1111111111111111111111111111111111111111",
          minBalance: undefined,
        },
        {
          name: "badge_holders",
          type: "erc1155",
          contract: "0x2222222222222222222222222222222222222222",
          tokenId: "7",
          minBalance: "2",
        },
        {
          name: "staff",
          type: "allowlist",
          addresses: ["0x3333333333333333333333333333333333333333"],
        },
      ]);
    });

    it("rejects invalid JSON", () => {
      assert.throws(
        () => parseGroupRules("not json"),
        (err: Error) => err instanceof ConfigurationError && err.message === "SIWE_CUSTOM_GROUPS is not valid JSON"
      );
    });

    it("rejects erc1155 rules without a token id", () => {
      assert.throws(
        () =>
          parseGroupRules(
            JSON.stringify([
              { name: "x", type: "erc1155", contract: "0x2222222222222222222222222222222222222222" },
            ])
          ),
        (err: Error) =>
          err instanceof ConfigurationError &&
          err.message === "SIWE_CUSTOM_GROUPS[0].tokenId is required for erc1155 rules"
      );
    });

    it("rejects invalid contract addresses and duplicate names", () => {
      assert.throws(
        () => parseGroupRules(JSON.stringify([{ name: "x", type: "erc20", contract: "0x1234" }])),
        ConfigurationError
      );
      assert.throws(
        () =>
          parseGroupRules(
            JSON.stringify([
              { name: "x", type: "allowlist", addresses: [] },
              { name: "x", type: "allowlist", addresses: [] },
            ])
          ),
        ConfigurationError
      );
    });

    it("rejects unknown rule types", () => {
      assert.throws(
        () => parseGroupRules(JSON.stringify([{ name: "x", type: "erc4626" }])),
        (err: Error) => err instanceof ConfigurationError && err.message.includes("erc4626")
      );
    });
  });

  describe("validateAuthConfigEnv", () => {
    it("returns empty array when all vars are set", () => {
      setRequiredEnvVars();
      assert.deepStrictEqual(validateAuthConfigEnv(), []);
    });

    it("lists missing variables", () => {
      process.env[ENV_VARS.SIWE_DOMAIN] = "app.example.com";
      assert.deepStrictEqual(validateAuthConfigEnv(), ["SIWE_PROVIDER_URL", "SESSION_SECRET"]);
    });

    it("includes database variables in production", () => {
      setRequiredEnvVars();
      process.env[ENV_VARS.APP_ENV] = "production";
      assert.deepStrictEqual(validateAuthConfigEnv(), ["DB_HOST", "DB_NAME", "DB_USER", "DB_PASSWORD"]);
    });
  });
});
