// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC7807-ish).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - ProblemFactory helpers used by the error funnel
 *
 * Invariants:
 * - No Express/HTTP framework imports.
 * - No process.env access.
 * - BindError subclasses map 1:1 onto a problem: their code, status and title
 *   are carried over verbatim.
 */

import {
  BindError,
  CoercionError,
  ConfigurationError,
  DecodeError,
  QueryPolicyError,
} from "../bind/errors";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ProblemJson = {
  type: string; // e.g. "about:blank" or a stable URN
  title: string;
  status: number;

  detail?: string;
  code?: string;

  requestId?: string;

  serviceSlug?: string;
  serviceVersion?: number;
  env?: string;

  meta?: Record<string, unknown>;
};

export class ProblemFactory {
  private readonly serviceSlug: string;
  private readonly serviceVersion: number;
  private readonly env: string;

  public constructor(opts: {
    serviceSlug: string;
    serviceVersion: number;
    env: string;
  }) {
    if (!opts.serviceSlug.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: serviceSlug is required. Ops: pass a valid serviceSlug."
      );
    }
    if (!Number.isFinite(opts.serviceVersion) || opts.serviceVersion <= 0) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: serviceVersion must be a positive number. Ops: pass a valid serviceVersion."
      );
    }
    if (!opts.env.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: env is required. Ops: pass a valid env label."
      );
    }

    this.serviceSlug = opts.serviceSlug.trim();
    this.serviceVersion = opts.serviceVersion;
    this.env = opts.env.trim();
  }

  private base(
    p: Omit<ProblemJson, "serviceSlug" | "serviceVersion" | "env">
  ): ProblemJson {
    return {
      serviceSlug: this.serviceSlug,
      serviceVersion: this.serviceVersion,
      env: this.env,
      ...p,
    };
  }

  public internalError(detail?: string, requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: detail ?? "An unexpected error occurred.",
      requestId,
    });
  }

  public notFound(path: string, requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: `No route matches ${path}.`,
      requestId,
    });
  }

  public fromBindError(err: BindError, requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: err.title,
      status: err.httpStatus,
      code: err.code,
      detail: err.message,
      requestId,
      meta: bindErrorMeta(err),
    });
  }
}

function bindErrorMeta(err: BindError): Record<string, unknown> | undefined {
  if (err instanceof DecodeError) {
    return {
      reason: err.reason,
      issues: err.issues.map((i) => ({ path: i.path, message: i.message })),
    };
  }
  if (err instanceof CoercionError) {
    return { field: err.field, kind: err.kind, source: err.source };
  }
  if (err instanceof QueryPolicyError) {
    return { key: err.key, reason: err.reason };
  }
  if (err instanceof ConfigurationError) {
    return { fields: err.fields };
  }
  return undefined;
}
