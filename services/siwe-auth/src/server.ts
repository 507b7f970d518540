// @walletgate/siwe-auth - service entry point
import { ConfigurationError, VERSION, getAuthEnvConfig } from "@walletgate/shared";
import { createApp } from "./app.js";
import { ChainService, EnsService, createChainClient } from "./chain/index.js";
import { createGroupBindings } from "./groups/index.js";
import { MemoryStorage, PgStorage, closePool, getPool, poolQuery, type AuthStorage } from "./storage/index.js";

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : 3002;

function main(): void {
  const env = getAuthEnvConfig();
  const groups = createGroupBindings(env.customGroups);

  let storage: AuthStorage;
  if (env.database) {
    storage = new PgStorage(poolQuery(getPool(env.database)), closePool);
  } else {
    storage = new MemoryStorage();
  }

  const client = createChainClient({ rpcUrl: env.providerUrl, timeoutMs: env.chainTimeoutMs });

  const { app, authService } = createApp(
    {
      providerUrl: env.providerUrl,
      domain: env.domain,
      uri: env.uri,
      jwtSecret: env.jwtSecret,
      csrfExempt: env.csrfExempt,
      groupsOnAuth: env.groupsOnAuth,
      ensProfileOnAuth: env.ensProfileOnAuth,
      groupRemoval: env.groupRemoval,
      sessionTtlMs: env.sessionTtlMs,
      sessionMaxAgeMs: env.sessionMaxAgeMs,
      nonceTtlMs: env.nonceTtlMs,
      clockSkewMs: env.clockSkewMs,
      chainTimeoutMs: env.chainTimeoutMs,
      cookieName: env.cookieName,
      secureCookies: env.secureCookies,
      allowedOrigins: env.allowedOrigins,
    },
    {
      storage,
      chainProvider: new ChainService(client),
      ensResolver: new EnsService(client),
      groups,
    }
  );

  const server = app.listen(PORT, () => {
    const { config } = authService;
    console.log(`SIWE auth service v${VERSION} listening on port ${PORT}`);
    console.log(`  Environment: ${env.env}`);
    console.log(`  Domain: ${config.domain} (${config.uri})`);
    console.log(`  Storage: ${storage.kind}`);
    console.log(
      `  Groups on auth: ${config.groupsOnAuth ? `enabled (${groups.length} groups, ${config.groupRemoval})` : "disabled"}`
    );
    console.log(`  ENS profile on auth: ${config.ensProfileOnAuth ? "enabled" : "disabled"}`);
    console.log(`  CSRF guard: ${config.csrfExempt ? "exempt" : "enabled"}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down...`);
    server.close(() => {
      storage
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[Storage] Failed to close:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(`Configuration error: ${err.message}`);
    if (err.missingVars?.length) {
      console.error(`  Missing: ${err.missingVars.join(", ")}`);
    }
    process.exit(1);
  }
  throw err;
}
