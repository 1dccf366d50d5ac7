import type { Request, Response } from "express";
import type { TodoStats } from "../../../core/entities/todo";

export interface HealthControllerDeps {
  getTodoStats: () => Promise<TodoStats>;
}

// Touches the store so a broken connection surfaces as a 500.
export default function createHealthController(deps: HealthControllerDeps) {
  return {
    check: async (_req: Request, res: Response) => {
      const { total } = await deps.getTodoStats();
      return res.status(200).json({ status: "ok", uptime: Math.round(process.uptime()), todos: total });
    },
  };
}
