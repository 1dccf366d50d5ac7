import type { Request, Response } from "express";
import type { Todo } from "../../../core/entities/todo";
import { presentTodo } from "../presenters/todoPresenter";

export interface AdminControllerDeps {
  resetTodos: () => Promise<Todo[]>;
}

export default function createAdminController(deps: AdminControllerDeps) {
  return {
    reset: async (_req: Request, res: Response) => {
      const seeded = await deps.resetTodos();
      console.log(`[admin] todos reset, ${seeded.length} seed rows inserted`);
      return res.status(200).json({ message: "Database reset", todos: seeded.map(presentTodo) });
    },
  };
}
