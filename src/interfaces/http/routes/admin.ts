import { Router } from "express";
import createAdminController, { type AdminControllerDeps } from "../controllers/adminController";
import { asyncHandler } from "../asyncHandler";

export function adminRoutes(deps: AdminControllerDeps) {
  const controller = createAdminController(deps);
  const router = Router();
  router.post("/admin/reset", asyncHandler(controller.reset));
  return router;
}
