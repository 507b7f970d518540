// Database migration script

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { getAuthEnvConfig } from "@walletgate/shared";
import { getPool, closePool } from "./pool.js";
import { findSchemaFile } from "./schemaPath.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

async function migrate(): Promise<void> {
  const { database } = getAuthEnvConfig();
  if (!database) {
    throw new Error("DB_HOST is not set - nothing to migrate (in-memory storage)");
  }

  console.log("Running database migrations...");

  const sql = fs.readFileSync(findSchemaFile(__dirname), "utf-8");

  const pool = getPool(database);

  try {
    await pool.query(sql);
    console.log("Migrations completed successfully");
  } catch (error) {
    console.error("Migration failed:", error);
    throw error;
  } finally {
    await closePool();
  }
}

migrate().catch((err) => {
  console.error(err);
  process.exit(1);
});
