export { initDb, closeDb, isDbInitialized, withConnection, DEFAULT_DB_PATH } from "./connection";
export { users } from "./repos/users";
export type { UserRow } from "./types";
