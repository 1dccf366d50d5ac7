import type { NewTodo, Todo, TodoPatch, TodoStats, TodoStatus } from "../entities/todo";

export interface TodoRepository {
  create(input: NewTodo): Promise<Todo>;
  list(status?: TodoStatus): Promise<Todo[]>;
  getById(id: number): Promise<Todo | null>;
  update(id: number, patch: TodoPatch): Promise<Todo | null>;
  toggle(id: number): Promise<Todo | null>;
  delete(id: number): Promise<boolean>;
  stats(): Promise<TodoStats>;
  /** Wipes every row and inserts the seed set under fresh ids. */
  reset(): Promise<Todo[]>;
  /** Inserts the seed set when the store holds no todos; returns rows added. */
  seedIfEmpty(): Promise<number>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
