import type { Database as DatabaseType } from "better-sqlite3";

export function runMigrations(conn: DatabaseType): void {
  // Discord snowflakes overflow a double, so ids are stored as text.
  conn.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      sheet_name TEXT UNIQUE,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT DEFAULT CURRENT_TIMESTAMP
    );
  `);
}
