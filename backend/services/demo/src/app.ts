// backend/services/demo/src/app.ts
/**
 * Purpose:
 * - Assemble the demo app on the shared builder. No side effects at import
 *   time: index.ts starts it, tests drive it in process.
 */

import type { Express, RequestHandler } from "express";
import { createServiceApp, getLogger } from "@bindparams/shared";
import type { DemoConfig } from "./config";
import { mountDemoRoutes } from "./routes/demo.routes";

export function createApp(config: DemoConfig, httpLogger?: RequestHandler): Express {
  return createServiceApp({
    serviceName: config.serviceName,
    serviceVersion: config.serviceVersion,
    envLabel: config.envLabel,
    log: getLogger({ service: config.serviceName }),
    httpLogger,
    mountRoutes: (router) => mountDemoRoutes(router, config.bindPolicy),
  });
}
