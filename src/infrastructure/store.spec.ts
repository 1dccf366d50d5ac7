import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SEED_TODOS } from "../core/seed";
import InMemoryTodoRepository from "./repositories/inMemoryTodoRepository";
import SqliteTodoRepository from "./repositories/sqliteTodoRepository";
import { openTodoStore } from "./store";

describe("openTodoStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "todo-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the database file and its directory, and keeps rows across reopen", async () => {
    const databasePath = path.join(dir, "nested", "deeper", "todos.db");

    const first = openTodoStore({ storeDriver: "sqlite", databasePath });
    expect(first.repo).toBeInstanceOf(SqliteTodoRepository);
    expect(fs.existsSync(databasePath)).toBe(true);
    expect(await first.repo.seedIfEmpty()).toBe(SEED_TODOS.length);
    const kept = await first.repo.create({ title: "Survive a restart" });
    first.close();

    const second = openTodoStore({ storeDriver: "sqlite", databasePath });
    try {
      expect(await second.repo.seedIfEmpty()).toBe(0);
      expect(await second.repo.getById(kept.id)).toEqual(kept);
      expect((await second.repo.list()).length).toBe(SEED_TODOS.length + 1);
    } finally {
      second.close();
    }
  });

  it("uses an in-memory repository for the memory driver", async () => {
    const store = openTodoStore({ storeDriver: "memory", databasePath: path.join(dir, "unused.db") });

    expect(store.repo).toBeInstanceOf(InMemoryTodoRepository);
    expect(await store.repo.seedIfEmpty()).toBe(SEED_TODOS.length);
    store.close();
    expect(fs.existsSync(path.join(dir, "unused.db"))).toBe(false);
  });
});
