// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured per-request access log (pino-http) so every line carries
 *   `service` and the correlation id.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware`; genReqId reuses the id it
 *   stored instead of minting a second one.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes and favicons are not logged.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { pinoHttp, type HttpLogger } from "pino-http";

const QUIET_URLS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

function headerId(req: IncomingMessage): string | undefined {
  const v = req.headers["x-request-id"];
  return Array.isArray(v) ? v[0] : v;
}

export function makeHttpLogger(logger: Logger, serviceName: string): HttpLogger {
  return pinoHttp({
    logger: logger.child({ service: serviceName }),

    // requestIdMiddleware has already echoed the id into the response header
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const echoed = res.getHeader("x-request-id");
      if (typeof echoed === "string" && echoed) return echoed;
      return headerId(req) ?? randomUUID();
    },

    customLogLevel: (_req, res, err) => {
      if (err) return "error";
      if (res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    customProps: (req) => ({ service: serviceName, reqId: req.id }),

    autoLogging: {
      ignore: (req) => QUIET_URLS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
