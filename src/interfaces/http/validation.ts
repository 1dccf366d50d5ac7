import { isTodoStatus, TODO_STATUSES, type TodoPatch, type TodoStatus } from "../../core/entities/todo";
import { NotFoundError, ValidationError } from "../../core/errors";

export interface CreateTodoBody {
  title?: string;
  description?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ValidationError(`${field} must be a string`);
  return value;
}

function optionalBoolean(body: Record<string, unknown>, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new ValidationError(`${field} must be a boolean`);
  return value;
}

export function parseCreateTodoBody(body: unknown): CreateTodoBody {
  if (!isPlainObject(body)) throw new ValidationError("Request body must be a JSON object");
  return {
    title: optionalString(body, "title"),
    description: optionalString(body, "description"),
  };
}

export function parseUpdateTodoBody(body: unknown): TodoPatch {
  if (!isPlainObject(body)) throw new ValidationError("Request body must be a JSON object");
  return {
    title: optionalString(body, "title"),
    description: optionalString(body, "description"),
    completed: optionalBoolean(body, "completed"),
  };
}

/** Anything that is not a positive decimal integer cannot name a todo. */
export function parseTodoId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) throw new NotFoundError();
  return id;
}

export function parseStatusQuery(value: unknown): TodoStatus | undefined {
  if (value === undefined) return undefined;
  if (!isTodoStatus(value)) {
    throw new ValidationError(`status must be one of: ${TODO_STATUSES.join(", ")}`);
  }
  return value;
}
