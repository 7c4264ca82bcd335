import Database from "better-sqlite3";
import { initializeSchema } from "./sqliteSchema.utils.js";

/**
 * Open an in-memory SQLite database with the index schema.
 * Each scan builds its index from scratch.
 *
 * @example
 * const db = openDatabase();
 */
export const openDatabase = (): Database.Database => {
  const db = new Database(":memory:");
  initializeSchema(db);
  return db;
};

/**
 * Close the database connection.
 */
export const closeDatabase = (db: Database.Database): void => {
  db.close();
};
