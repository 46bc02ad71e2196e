/**
 * CRUD operations for the runs and fields tables.
 */
import type { Client, InStatement, InValue, Row } from "@libsql/client";
import { IndexError, isJsonObject, type FlatRecord } from "@labtrack/core";
import type { DbField, DbRun, RunFilter } from "./types.js";

const CHUNK_SIZE = 500;

function rowToRun(row: Row): DbRun {
  const { id, log_dir, metadata, indexed_at } = row;
  if (typeof id !== "number" || typeof log_dir !== "string" || typeof metadata !== "string") {
    throw new IndexError({ message: `Malformed runs row: ${JSON.stringify({ id, log_dir })}` });
  }
  const parsed: unknown = JSON.parse(metadata);
  if (!isJsonObject(parsed)) {
    throw new IndexError({ message: `Run ${id} has non-object metadata` });
  }
  return { id, log_dir, metadata: parsed, indexed_at: typeof indexed_at === "string" ? indexed_at : "" };
}

/** JSON path for a flattened key, quoted so dots stay part of the key. */
function jsonPath(key: string): string {
  if (key.includes('"')) {
    throw new IndexError({ message: `Cannot filter on key containing a double quote: ${key}` });
  }
  return `$."${key}"`;
}

export async function upsertRun(client: Client, id: number, logDir: string, metadata: FlatRecord): Promise<void> {
  await client.execute({
    sql: `INSERT INTO runs (id, log_dir, metadata, indexed_at)
          VALUES (?, ?, ?, datetime('now'))
          ON CONFLICT(id) DO UPDATE SET
            log_dir = excluded.log_dir,
            metadata = excluded.metadata,
            indexed_at = datetime('now')`,
    args: [id, logDir, JSON.stringify(metadata)],
  });
}

export async function getRun(client: Client, id: number): Promise<DbRun | null> {
  const result = await client.execute({
    sql: "SELECT * FROM runs WHERE id = ?",
    args: [id],
  });
  const row = result.rows[0];
  return row ? rowToRun(row) : null;
}

/** Runs matching every equality in `filter`, by ascending id. */
export async function listRuns(client: Client, filter: RunFilter = {}): Promise<DbRun[]> {
  const conditions: string[] = [];
  const args: InValue[] = [];

  for (const [key, value] of Object.entries(filter)) {
    if (value === null) {
      conditions.push("json_extract(metadata, ?) IS NULL");
      args.push(jsonPath(key));
    } else {
      conditions.push("json_extract(metadata, ?) = ?");
      args.push(jsonPath(key), value);
    }
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  const result = await client.execute({
    sql: `SELECT * FROM runs ${where} ORDER BY id ASC`,
    args,
  });
  return result.rows.map(rowToRun);
}

export async function countRuns(client: Client): Promise<number> {
  const result = await client.execute("SELECT COUNT(*) AS n FROM runs");
  return Number(result.rows[0]?.n ?? 0);
}

export async function listFields(client: Client): Promise<DbField[]> {
  const result = await client.execute("SELECT key, type FROM fields ORDER BY key ASC");
  return result.rows.map((row) => ({ key: String(row.key), type: String(row.type) }));
}

export interface IndexedRun {
  id: number;
  logDir: string;
  metadata: FlatRecord;
}

/** Replace both tables with `runs` and `fields`, in chunked write batches. */
export async function replaceIndex(
  client: Client,
  runs: readonly IndexedRun[],
  fields: Readonly<Record<string, string>>
): Promise<void> {
  await client.batch(["DELETE FROM runs", "DELETE FROM fields"], "write");

  const statements: InStatement[] = [
    ...runs.map((run) => ({
      sql: "INSERT INTO runs (id, log_dir, metadata) VALUES (?, ?, ?)",
      args: [run.id, run.logDir, JSON.stringify(run.metadata)],
    })),
    ...Object.entries(fields).map(([key, type]) => ({
      sql: "INSERT INTO fields (key, type) VALUES (?, ?)",
      args: [key, type],
    })),
  ];

  for (let i = 0; i < statements.length; i += CHUNK_SIZE) {
    await client.batch(statements.slice(i, i + CHUNK_SIZE), "write");
  }
}
