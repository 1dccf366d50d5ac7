import { ValidationError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (
  input: { title?: string; description?: string }
) => {
  const title = input.title?.trim();
  if (!title) {
    throw new ValidationError(input.title === undefined ? "Title is required" : "Title cannot be empty");
  }
  return repo.create({ title, description: input.description?.trim() ?? "" });
};
