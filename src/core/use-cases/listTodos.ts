import type { TodoStatus } from "../entities/todo";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (status?: TodoStatus) => {
  return repo.list(status);
};
