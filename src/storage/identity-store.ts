import Database from "better-sqlite3";
import { users } from "./repos/users";

/** `holderId` is null when the holder let go of the name before it could be looked up. */
export type BindNameOutcome = { status: "bound" } | { status: "taken"; holderId: string | null };

/** Maps a chat user id to the spreadsheet column that user answers to. */
export interface IdentityStore {
  get(id: string): Promise<string | null>;
  /** Binds `name` to `id` unless another id holds it. */
  set(id: string, name: string): Promise<BindNameOutcome>;
  delete(id: string): Promise<void>;
  findIdByName(name: string): Promise<string | null>;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_UNIQUE";
}

export function createSqliteIdentityStore(): IdentityStore {
  return {
    get: async (id) => users.getById(id)?.sheet_name ?? null,
    set: async (id, name) => {
      try {
        users.setSheetName(id, name);
      } catch (error) {
        if (!isUniqueViolation(error)) {
          throw error;
        }
        return { status: "taken", holderId: users.getBySheetName(name)?.id ?? null };
      }
      return { status: "bound" };
    },
    delete: async (id) => {
      users.delete(id);
    },
    findIdByName: async (name) => users.getBySheetName(name)?.id ?? null,
  };
}
