import { NotFoundError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number) => {
  const todo = await repo.getById(id);
  if (!todo) throw new NotFoundError();
  return todo;
};
