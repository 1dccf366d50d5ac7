import type { TodoRepository } from "../ports/TodoRepository";

// Destructive: only wired up when the admin routes are enabled.
export default (repo: TodoRepository) => async () => {
  return repo.reset();
};
