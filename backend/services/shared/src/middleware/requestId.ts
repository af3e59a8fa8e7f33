// backend/services/shared/src/middleware/requestId.ts
/**
 * Purpose:
 * - Give every inbound request a stable correlation key.
 *
 * Notes:
 * - Order matters: mount before the http logger and any binding routes so
 *   their log lines and problem bodies carry the id.
 * - Never overwrite a caller-supplied id; mint a UUID only when the request
 *   lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The id is echoed as `x-request-id` and stored in `res.locals.requestId`.
 */

import type { Request, RequestHandler, Response } from "express";
import { randomUUID } from "node:crypto";

const HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"];

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    let id: string | undefined;
    for (const h of HEADERS) {
      const v = req.headers[h];
      const first = Array.isArray(v) ? v[0] : v;
      if (first) {
        id = first;
        break;
      }
    }
    id ??= randomUUID();

    res.locals.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  };
}

/** Read the id set by requestIdMiddleware (undefined if it is not mounted). */
export function getRequestId(_req: Request, res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : undefined;
}
