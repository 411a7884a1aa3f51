import express, { Express } from "express";
import cors from "cors";
import { json } from "body-parser";
import type { Server } from "http";
import { registerRoutes, RouteDeps } from "./routes";
import { logger } from "../utils/logger";

export function createApp(deps: RouteDeps): Express {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(json({ limit: "1mb" }));

  registerRoutes(app, deps);
  return app;
}

export function startServer(deps: RouteDeps, port: number): Server {
  const app = createApp(deps);
  return app.listen(port, () => logger.info(`Redaction API listening on :${port}`));
}
