import { Router } from "express";
import type { AdminControllerDeps } from "../controllers/adminController";
import type { TodoControllerDeps } from "../controllers/todoController";
import { adminRoutes } from "./admin";
import { healthRoutes } from "./health";
import { todoRoutes } from "./todos";

export type HttpRouterDeps = TodoControllerDeps & AdminControllerDeps;

export function makeHttpRouter(deps: HttpRouterDeps, options: { enableReset: boolean }) {
  const router = Router();

  router.use(healthRoutes(deps));
  router.use(todoRoutes(deps));
  if (options.enableReset) {
    router.use(adminRoutes(deps));
  }

  return router;
}
