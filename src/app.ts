import express from "express";
import cors from "cors";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import apiSpec from "./docs/openapi.json";

import type { TodoRepository } from "./core/ports/TodoRepository";
import { makeTodoUseCases } from "./core/use-cases";
import { makeHttpRouter } from "./interfaces/http/routes";
import { errorHandler, notFoundHandler } from "./interfaces/http/middlewares/errorHandler";

export interface AppOptions {
  repo: TodoRepository;
  /** morgan format; null disables access logging */
  logFormat?: string | null;
  enableReset?: boolean;
}

export function createApp({ repo, logFormat = "dev", enableReset = false }: AppOptions) {
  const useCases = makeTodoUseCases(repo);
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (logFormat) {
    app.use(morgan(logFormat));
  }

  // API Docs (Swagger UI)
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiSpec));
  app.get("/docs-json", (_req, res) => res.json(apiSpec));

  app.use(makeHttpRouter(useCases, { enableReset }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
