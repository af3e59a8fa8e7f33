// backend/services/shared/src/app/createServiceApp.ts

/**
 * Purpose:
 * - Assemble the standard service stack around a set of binding routes:
 *   requestId → http logger (optional) → health → routes → 404 → problem funnel.
 *
 * Notes:
 * - No body parsers are mounted. Binding routes read the raw request stream
 *   themselves; a JSON parser in front of them would drain it first.
 * - Health stays open and is not access-logged.
 */

import express, { type Express, type RequestHandler } from "express";
import type { IBoundLogger } from "../logger/Logger";
import { requestIdMiddleware } from "../middleware/requestId";
import {
  createNotFoundHandler,
  createProblemMiddleware,
} from "../problem/createProblemMiddleware";

export type CreateServiceAppOptions = {
  /** Service slug (e.g. "demo"). Used in logs and problem bodies. */
  serviceName: string;
  serviceVersion: number;
  envLabel: string;
  log: IBoundLogger;
  /** Access logger, normally makeHttpLogger(); omitted in tests. */
  httpLogger?: RequestHandler;
  /** Mounts the service's routes; one-liners only. */
  mountRoutes: (router: express.Router) => void;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, serviceVersion, envLabel, log, httpLogger, mountRoutes } =
    opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  if (httpLogger) app.use(httpLogger);

  // ── Health ──────────────────────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({ service: serviceName, version: serviceVersion, status: "ok" });
  });

  // ── Routes ──────────────────────────────────────────────────────────────────
  const router = express.Router();
  mountRoutes(router);
  app.use(router);

  // ── Tails: 404 + error funnel ───────────────────────────────────────────────
  app.use(createNotFoundHandler({ serviceSlug: serviceName, serviceVersion, envLabel }));
  app.use(
    createProblemMiddleware({
      log,
      serviceSlug: serviceName,
      serviceVersion,
      envLabel,
    })
  );

  return app;
}
