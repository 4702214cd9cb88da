import Database, { type Database as DatabaseType } from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../logger";
import { runMigrations } from "./migrations";

export const DEFAULT_DB_PATH = "data/gamelist.db";

// better-sqlite3 is synchronous, so one handle serves every caller in the process.
let db: DatabaseType | null = null;

export function isDbInitialized(): boolean {
  return db !== null;
}

/** Opens (creating if needed) the identity database and brings its schema up to date. */
export function initDb(path: string = DEFAULT_DB_PATH): void {
  closeDb();

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const conn = new Database(path);
  conn.pragma("journal_mode = WAL");
  conn.pragma("synchronous = NORMAL");
  conn.pragma("busy_timeout = 5000");
  runMigrations(conn);
  db = conn;
  logger.info({ path }, "Identity database ready");
}

export function withConnection<T>(fn: (conn: DatabaseType) => T): T {
  if (!db) {
    throw new Error("Database not initialized");
  }
  return fn(db);
}

export function closeDb(): void {
  db?.close();
  db = null;
}
