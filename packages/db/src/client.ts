/**
 * Database client creation: connect, then apply pending migrations.
 *
 * Reads LABTRACK_DB_URL from the environment by default.
 */
import { createClient, type Client } from "@libsql/client";
import { migrate } from "./migrate.js";

export interface DbOptions {
  url?: string;
  authToken?: string;
}

export async function createDb(opts?: DbOptions): Promise<Client> {
  const url = opts?.url ?? process.env.LABTRACK_DB_URL;
  const authToken = opts?.authToken ?? process.env.LABTRACK_DB_AUTH_TOKEN;

  if (!url) {
    throw new Error(
      "No database URL: set LABTRACK_DB_URL or pass opts.url"
    );
  }

  const isRemote = url.startsWith("libsql://") || url.startsWith("https://");

  const client = createClient({ url, authToken });

  // WAL only applies to local SQLite files
  if (!isRemote) {
    await client.execute("PRAGMA journal_mode=WAL");
  }

  await migrate(client);
  return client;
}
