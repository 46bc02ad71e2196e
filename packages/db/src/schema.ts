/**
 * Database schema migrations.
 *
 * Each entry is a migration version. The migrate runner applies them
 * sequentially and tracks the current version in schema_version.
 */

export const migrations: string[][] = [
  // Version 1: flattened run metadata and the field registry
  [
    `CREATE TABLE IF NOT EXISTS runs (
      id          INTEGER PRIMARY KEY,
      log_dir     TEXT NOT NULL,
      metadata    TEXT NOT NULL,
      indexed_at  TEXT NOT NULL DEFAULT (datetime('now'))
    )`,

    `CREATE TABLE IF NOT EXISTS fields (
      key   TEXT PRIMARY KEY,
      type  TEXT NOT NULL
    )`,
  ],
];
