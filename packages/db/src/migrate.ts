/**
 * Version-based migration runner.
 *
 * Applied versions live in a schema_version table; each pending migration is
 * applied in one write batch together with its version row.
 */
import type { Client } from "@libsql/client";
import { migrations } from "./schema.js";

export async function currentSchemaVersion(client: Client): Promise<number> {
  await client.execute(
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )`
  );
  const result = await client.execute(
    "SELECT COALESCE(MAX(version), 0) AS v FROM schema_version"
  );
  const v = result.rows[0]?.v;
  return typeof v === "number" ? v : Number(v ?? 0);
}

/** Apply pending migrations; returns how many ran. */
export async function migrate(client: Client): Promise<number> {
  const current = await currentSchemaVersion(client);

  let applied = 0;
  for (let version = current + 1; version <= migrations.length; version++) {
    await client.batch(
      [
        ...migrations[version - 1].map((sql) => ({ sql, args: [] })),
        { sql: "INSERT INTO schema_version (version) VALUES (?)", args: [version] },
      ],
      "write"
    );
    applied++;
  }

  return applied;
}
