import { asc, count, eq, sql } from "drizzle-orm";
import type { SQLiteUpdateSetSource } from "drizzle-orm/sqlite-core";
import { computeStats, type NewTodo, type Todo, type TodoPatch, type TodoStats, type TodoStatus } from "../../core/entities/todo";
import { type Clock, systemClock, type TodoRepository } from "../../core/ports/TodoRepository";
import { SEED_TODOS } from "../../core/seed";
import type { TodoDatabase } from "../database/connection";
import { todos, type TodoInsert } from "../database/schema";

/**
 * Drizzle-backed repository. better-sqlite3 is synchronous, so every
 * statement has committed by the time the returned promise settles.
 */
export default class SqliteTodoRepository implements TodoRepository {
  constructor(
    private readonly db: TodoDatabase,
    private readonly now: Clock = systemClock
  ) {}

  async create({ title, description = "", completed = false }: NewTodo): Promise<Todo> {
    const now = this.now();
    const row = this.db
      .insert(todos)
      .values({ title, description, completed, createdAt: now, updatedAt: now })
      .returning()
      .get();
    if (!row) throw new Error("Insert into todos returned no row");
    return row;
  }

  async list(status?: TodoStatus): Promise<Todo[]> {
    return this.db
      .select()
      .from(todos)
      .where(status === undefined ? undefined : eq(todos.completed, status === "completed"))
      .orderBy(asc(todos.id))
      .all();
  }

  async getById(id: number): Promise<Todo | null> {
    return this.db.select().from(todos).where(eq(todos.id, id)).get() ?? null;
  }

  async update(id: number, patch: TodoPatch): Promise<Todo | null> {
    const values: SQLiteUpdateSetSource<typeof todos> = { updatedAt: this.touched() };
    if (patch.title !== undefined) values.title = patch.title;
    if (patch.description !== undefined) values.description = patch.description;
    if (patch.completed !== undefined) values.completed = patch.completed;

    return this.db.update(todos).set(values).where(eq(todos.id, id)).returning().get() ?? null;
  }

  async toggle(id: number): Promise<Todo | null> {
    return (
      this.db
        .update(todos)
        .set({ completed: sql`NOT ${todos.completed}`, updatedAt: this.touched() })
        .where(eq(todos.id, id))
        .returning()
        .get() ?? null
    );
  }

  async delete(id: number): Promise<boolean> {
    const result = this.db.delete(todos).where(eq(todos.id, id)).run();
    return result.changes > 0;
  }

  async stats(): Promise<TodoStats> {
    const row = this.db
      .select({
        total: count(),
        completed: sql<number>`coalesce(sum(${todos.completed}), 0)`.mapWith(Number),
      })
      .from(todos)
      .get();
    return computeStats(row?.total ?? 0, row?.completed ?? 0);
  }

  async reset(): Promise<Todo[]> {
    return this.db.transaction(tx => {
      tx.delete(todos).run();
      tx.insert(todos).values(this.seedRows()).run();
      return tx.select().from(todos).orderBy(asc(todos.id)).all();
    });
  }

  async seedIfEmpty(): Promise<number> {
    return this.db.transaction(tx => {
      const existing = tx.select({ n: count() }).from(todos).get();
      if ((existing?.n ?? 0) > 0) return 0;
      tx.insert(todos).values(this.seedRows()).run();
      return SEED_TODOS.length;
    });
  }

  // A clock that steps back must not leave updated_at before created_at.
  private touched() {
    return sql`max(${todos.createdAt}, ${this.now().getTime()})`;
  }

  private seedRows(): TodoInsert[] {
    const now = this.now();
    return SEED_TODOS.map(seed => ({ ...seed, createdAt: now, updatedAt: now }));
  }
}
