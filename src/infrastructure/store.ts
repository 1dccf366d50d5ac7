import type { AppConfig } from "../config";
import type { TodoRepository } from "../core/ports/TodoRepository";
import { openDatabase } from "./database/connection";
import InMemoryTodoRepository from "./repositories/inMemoryTodoRepository";
import SqliteTodoRepository from "./repositories/sqliteTodoRepository";

export interface TodoStore {
  repo: TodoRepository;
  close(): void;
}

export function openTodoStore(config: Pick<AppConfig, "storeDriver" | "databasePath">): TodoStore {
  if (config.storeDriver === "memory") {
    return { repo: new InMemoryTodoRepository(), close: () => undefined };
  }
  const handle = openDatabase(config.databasePath);
  return { repo: new SqliteTodoRepository(handle.db), close: handle.close };
}
