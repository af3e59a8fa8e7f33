// backend/services/shared/src/problem/createProblemMiddleware.ts
/**
 * Purpose:
 * - Express-only final error funnel.
 * - BindError → problem built from the error itself (4xx logged as warn,
 *   5xx as error).
 * - Anything else → generic 500 problem + error log.
 *
 * Invariants:
 * - Express import allowed here (adapter).
 * - No process.env reads.
 * - Responses always carry `application/problem+json`.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { BindError } from "../bind/errors";
import type { IBoundLogger } from "../logger/Logger";
import { getRequestId } from "../middleware/requestId";
import { PROBLEM_CONTENT_TYPE, ProblemFactory, type ProblemJson } from "./problem";

export type ProblemMiddlewareOptions = {
  log: IBoundLogger;
  serviceSlug: string;
  serviceVersion: number;
  envLabel: string;
};

export function createProblemMiddleware(
  opts: ProblemMiddlewareOptions
): ErrorRequestHandler {
  const { log, serviceSlug, serviceVersion, envLabel } = opts;
  const pf = new ProblemFactory({
    serviceSlug,
    serviceVersion,
    env: envLabel,
  });

  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);

    const requestId = getRequestId(req, res);
    let p: ProblemJson;

    if (err instanceof BindError) {
      p = pf.fromBindError(err, requestId);
      const meta = {
        requestId,
        method: req.method,
        path: req.path,
        code: err.code,
        status: err.httpStatus,
      };
      if (err.httpStatus >= 500) {
        log.error({ ...meta, error: log.serializeError(err) }, "binding misconfigured");
      } else {
        log.warn({ ...meta, detail: err.message }, "request rejected by binding");
      }
    } else {
      log.error(
        {
          requestId,
          method: req.method,
          path: req.path,
          service: serviceSlug,
          serviceVersion,
          env: envLabel,
          error: log.serializeError(err),
        },
        "unhandled error in request pipeline"
      );
      p = pf.internalError(undefined, requestId);
    }

    res.status(p.status).type(PROBLEM_CONTENT_TYPE).json(p);
  };
}

/** Terminal 404 in the same problem shape; mount after all routes. */
export function createNotFoundHandler(
  opts: Omit<ProblemMiddlewareOptions, "log">
): RequestHandler {
  const pf = new ProblemFactory({
    serviceSlug: opts.serviceSlug,
    serviceVersion: opts.serviceVersion,
    env: opts.envLabel,
  });
  return (req, res) => {
    const p = pf.notFound(req.path, getRequestId(req, res));
    res.status(p.status).type(PROBLEM_CONTENT_TYPE).json(p);
  };
}
