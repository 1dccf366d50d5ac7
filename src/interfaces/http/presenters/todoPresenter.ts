import type { Todo, TodoStats } from "../../../core/entities/todo";

export interface TodoJson {
  id: number;
  title: string;
  description: string;
  completed: boolean;
  created_at: string;
  updated_at: string;
}

export interface TodoStatsJson {
  total: number;
  completed: number;
  pending: number;
  completion_rate: number;
}

export function presentTodo(todo: Todo): TodoJson {
  return {
    id: todo.id,
    title: todo.title,
    description: todo.description,
    completed: todo.completed,
    created_at: todo.createdAt.toISOString(),
    updated_at: todo.updatedAt.toISOString(),
  };
}

export function presentStats(stats: TodoStats): TodoStatsJson {
  return {
    total: stats.total,
    completed: stats.completed,
    pending: stats.pending,
    completion_rate: stats.completionRate,
  };
}
