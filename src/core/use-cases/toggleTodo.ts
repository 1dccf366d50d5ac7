import { NotFoundError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number) => {
  const toggled = await repo.toggle(id);
  if (!toggled) throw new NotFoundError();
  return toggled;
};
