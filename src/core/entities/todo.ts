export type TodoStatus = "pending" | "completed";

export const TODO_STATUSES: readonly TodoStatus[] = ["pending", "completed"];

export interface Todo {
  id: number;
  title: string;
  description: string;
  completed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewTodo {
  title: string;
  description?: string;
  completed?: boolean;
}

/**
 * Fields a caller may change on an existing todo. A key that is absent
 * (or undefined) leaves the stored value untouched.
 */
export interface TodoPatch {
  title?: string;
  description?: string;
  completed?: boolean;
}

export interface TodoStats {
  total: number;
  completed: number;
  pending: number;
  completionRate: number;
}

export function isTodoStatus(value: unknown): value is TodoStatus {
  return typeof value === "string" && (TODO_STATUSES as readonly string[]).includes(value);
}

export function computeStats(total: number, completed: number): TodoStats {
  return {
    total,
    completed,
    pending: total - completed,
    completionRate: total === 0 ? 0 : (completed / total) * 100,
  };
}
