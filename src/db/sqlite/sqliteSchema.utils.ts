import type Database from "better-sqlite3";

/**
 * SQLite schema for the dependency index.
 *
 * Tables:
 * - scripts: one row per indexed script, `seq` keeps indexing order
 * - script_targets: tables a script writes (the reverse index)
 * - script_sources: tables a script reads
 *
 * A partial (database-less) table is stored with database = ''.
 */

const SCRIPTS_TABLE = `
CREATE TABLE IF NOT EXISTS scripts (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  script_id TEXT NOT NULL UNIQUE,
  kind TEXT NOT NULL
)`;

const SCRIPT_TARGETS_TABLE = `
CREATE TABLE IF NOT EXISTS script_targets (
  script_id TEXT NOT NULL,
  database TEXT NOT NULL DEFAULT '',
  table_name TEXT NOT NULL,
  PRIMARY KEY (script_id, database, table_name)
)`;

const SCRIPT_SOURCES_TABLE = `
CREATE TABLE IF NOT EXISTS script_sources (
  script_id TEXT NOT NULL,
  database TEXT NOT NULL DEFAULT '',
  table_name TEXT NOT NULL,
  PRIMARY KEY (script_id, database, table_name)
)`;

const INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_targets_table ON script_targets(database, table_name)",
  "CREATE INDEX IF NOT EXISTS idx_targets_name ON script_targets(table_name)",
];

/**
 * Initialize the schema on a database connection.
 * Creates tables and indexes if they don't exist.
 *
 * @param db - better-sqlite3 database instance
 */
export const initializeSchema = (db: Database.Database): void => {
  db.exec(SCRIPTS_TABLE);
  db.exec(SCRIPT_TARGETS_TABLE);
  db.exec(SCRIPT_SOURCES_TABLE);

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

