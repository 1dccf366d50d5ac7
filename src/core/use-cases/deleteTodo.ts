import { NotFoundError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number) => {
  const removed = await repo.delete(id);
  if (!removed) throw new NotFoundError();
};
