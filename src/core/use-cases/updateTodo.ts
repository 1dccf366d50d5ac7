import type { TodoPatch } from "../entities/todo";
import { NotFoundError, ValidationError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number, data: TodoPatch) => {
  const payload: TodoPatch = {};

  if (data.title !== undefined) {
    const title = data.title.trim();
    if (!title) throw new ValidationError("Title cannot be empty");
    payload.title = title;
  }

  if (data.description !== undefined) {
    payload.description = data.description.trim();
  }

  if (data.completed !== undefined) {
    payload.completed = data.completed;
  }

  if (Object.keys(payload).length === 0) {
    throw new ValidationError("At least one field (title, description, completed) must be provided");
  }

  const updated = await repo.update(id, payload);
  if (!updated) throw new NotFoundError();
  return updated;
};
