import fs from "fs";
import path from "path";

/**
 * Locate schema.sql for a migrate script living in `dir`.
 *
 * Under tsx the file sits beside the script. A build under `dist/` does not
 * copy it, so fall back to the same path in the source tree.
 */
export function findSchemaFile(dir: string, exists: (file: string) => boolean = fs.existsSync): string {
  const beside = path.join(dir, "schema.sql");
  if (exists(beside)) return beside;

  const marker = `${path.sep}dist${path.sep}`;
  const index = beside.lastIndexOf(marker);
  const source = index === -1 ? null : beside.slice(0, index) + path.sep + beside.slice(index + marker.length);
  if (source && exists(source)) return source;

  throw new Error(`Schema file not found at ${beside}${source ? ` or ${source}` : ""}`);
}
