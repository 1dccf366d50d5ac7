import { computeStats, type NewTodo, type Todo, type TodoPatch, type TodoStats, type TodoStatus } from "../../core/entities/todo";
import { type Clock, systemClock, type TodoRepository } from "../../core/ports/TodoRepository";
import { SEED_TODOS } from "../../core/seed";

export default class InMemoryTodoRepository implements TodoRepository {
  private items = new Map<number, Todo>();
  private seq = 1;

  constructor(private readonly now: Clock = systemClock) {}

  private nextId(): number {
    return this.seq++;
  }

  async create({ title, description = "", completed = false }: NewTodo): Promise<Todo> {
    const now = this.now();
    const id = this.nextId();
    const todo: Todo = { id, title, description, completed, createdAt: now, updatedAt: now };
    this.items.set(id, todo);
    return { ...todo };
  }

  // Map iteration follows insertion order, which is id order here.
  async list(status?: TodoStatus): Promise<Todo[]> {
    return Array.from(this.items.values())
      .filter(t => status === undefined || t.completed === (status === "completed"))
      .map(t => ({ ...t }));
  }

  async getById(id: number): Promise<Todo | null> {
    const t = this.items.get(id);
    return t ? { ...t } : null;
  }

  async update(id: number, patch: TodoPatch): Promise<Todo | null> {
    const current = this.items.get(id);
    if (!current) return null;
    const updated: Todo = {
      ...current,
      ...(patch.title !== undefined ? { title: patch.title } : {}),
      ...(patch.description !== undefined ? { description: patch.description } : {}),
      ...(patch.completed !== undefined ? { completed: patch.completed } : {}),
      // never before createdAt, even if the clock steps back
      updatedAt: new Date(Math.max(this.now().getTime(), current.createdAt.getTime())),
    };
    this.items.set(id, updated);
    return { ...updated };
  }

  async toggle(id: number): Promise<Todo | null> {
    const current = this.items.get(id);
    if (!current) return null;
    return this.update(id, { completed: !current.completed });
  }

  async delete(id: number): Promise<boolean> {
    return this.items.delete(id);
  }

  async stats(): Promise<TodoStats> {
    const all = Array.from(this.items.values());
    return computeStats(all.length, all.filter(t => t.completed).length);
  }

  async reset(): Promise<Todo[]> {
    this.items.clear();
    const seeded: Todo[] = [];
    for (const seed of SEED_TODOS) seeded.push(await this.create(seed));
    return seeded;
  }

  async seedIfEmpty(): Promise<number> {
    if (this.items.size > 0) return 0;
    for (const seed of SEED_TODOS) await this.create(seed);
    return SEED_TODOS.length;
  }
}
