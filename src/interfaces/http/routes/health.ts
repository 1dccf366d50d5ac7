import { Router } from "express";
import createHealthController, { type HealthControllerDeps } from "../controllers/healthController";
import { asyncHandler } from "../asyncHandler";

export function healthRoutes(deps: HealthControllerDeps) {
  const controller = createHealthController(deps);
  const router = Router();
  router.get("/health", asyncHandler(controller.check));
  return router;
}
