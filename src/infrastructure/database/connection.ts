import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import fs from "fs";
import path from "path";
import { CREATE_TODOS_TABLE, todos } from "./schema";

const schema = { todos };

export type TodoDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: TodoDatabase;
  close(): void;
}

const IN_MEMORY = ":memory:";

/**
 * Opens (or creates) the SQLite file and makes sure the todos table exists.
 * The returned handle owns the connection; call `close()` on shutdown.
 */
export function openDatabase(filename: string): DatabaseHandle {
  if (filename !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const sqlite = new Database(filename);
  if (filename !== IN_MEMORY) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(CREATE_TODOS_TABLE);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
