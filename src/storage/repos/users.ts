import { withConnection } from "../connection";
import type { UserRow } from "../types";

export const users = {
  getById: (id: string): UserRow | null =>
    withConnection(
      (conn) =>
        (conn.prepare("SELECT * FROM users WHERE id = ?").get(id) as UserRow | undefined) ?? null,
    ),
  getBySheetName: (sheetName: string): UserRow | null =>
    withConnection(
      (conn) =>
        (conn.prepare("SELECT * FROM users WHERE sheet_name = ?").get(sheetName) as
          | UserRow
          | undefined) ?? null,
    ),
  setSheetName: (id: string, sheetName: string) =>
    withConnection((conn) =>
      conn
        .prepare(
          `INSERT INTO users (id, sheet_name) VALUES ($id, $sheet_name)
           ON CONFLICT(id) DO UPDATE SET sheet_name = excluded.sheet_name, updated_at = CURRENT_TIMESTAMP`,
        )
        .run({ id, sheet_name: sheetName }),
    ),
  delete: (id: string) =>
    withConnection((conn) => conn.prepare("DELETE FROM users WHERE id = ?").run(id)),
};
