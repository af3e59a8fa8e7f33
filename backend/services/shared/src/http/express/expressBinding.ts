// backend/services/shared/src/http/express/expressBinding.ts
/**
 * Purpose:
 * - Express adapter for the binding engine.
 *   • urlParamLookup():   path-parameter lookup over req.params
 *   • toBindingRequest(): query multimap + body stream for one request
 *   • bindRoute():        RequestHandler that binds, responds, and forwards failures
 *
 * Invariants:
 * - The query multimap is built from the raw URL, not req.query, so "[]"
 *   suffixes, duplicate keys, and key order survive untouched.
 * - The body is the request stream itself. Binding routes must NOT sit behind
 *   express.json() (the stream would already be drained).
 * - Errors are never answered here; they go to next() and the problem
 *   middleware turns them into responses.
 */

import type { Request, RequestHandler, Response } from "express";
import { bindInto, type BindableHandler, type Outputs } from "../../bind/into";
import {
  paramLookupFrom,
  queryFromUrl,
  type BindingRequest,
  type UrlParamLookup,
} from "../../bind/request";
import { asyncHandler } from "../../middleware/asyncHandler";

/** Case-insensitive; scans from the last declared route parameter to the first. */
export function urlParamLookup(req: Request): UrlParamLookup {
  return paramLookupFrom(Object.entries(req.params ?? {}));
}

export function toBindingRequest(req: Request): BindingRequest {
  return {
    query: queryFromUrl(req.originalUrl || req.url),
    body: req,
  };
}

export type Responder<R extends Outputs> = (
  res: Response,
  outputs: R,
  req: Request
) => void;

export function bindRoute<R extends Outputs>(
  handler: BindableHandler<R>,
  respond: Responder<R>
): RequestHandler {
  return asyncHandler(async (req, res) => {
    const outputs = await bindInto(
      toBindingRequest(req),
      urlParamLookup(req),
      handler
    );
    respond(res, outputs, req);
  });
}
