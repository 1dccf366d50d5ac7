import { Router } from "express";
import createTodoController, { type TodoControllerDeps } from "../controllers/todoController";
import { asyncHandler } from "../asyncHandler";

export function todoRoutes(deps: TodoControllerDeps) {
  const controller = createTodoController(deps);
  const router = Router();

  router.get("/todos", asyncHandler(controller.list));
  // before /todos/:id so "stats" is not read as an id
  router.get("/todos/stats", asyncHandler(controller.stats));
  router.get("/todos/:id", asyncHandler(controller.get));
  router.post("/todos", asyncHandler(controller.create));
  router.put("/todos/:id", asyncHandler(controller.update));
  router.delete("/todos/:id", asyncHandler(controller.remove));
  router.patch("/todos/:id/toggle", asyncHandler(controller.toggle));

  return router;
}
