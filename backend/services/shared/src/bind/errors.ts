// backend/services/shared/src/bind/errors.ts
/**
 * Purpose:
 * - Typed failures raised by the binding engine.
 * - Each carries a stable `code`, an HTTP status hint and a short title so the
 *   request layer can build a problem response without guessing.
 *
 * Taxonomy:
 * - ConfigurationError → handler declared an unbindable signature (500).
 * - DecodeError        → body unreadable, malformed, or wrong shape (400).
 * - CoercionError      → strict coercion rejected a value (400).
 * - QueryPolicyError   → strict query policy rejected a key (400).
 *
 * Notes:
 * - Lenient coercion failures are not errors; the field keeps its zero value.
 */

import type { ZodIssue } from "zod";
import type { ScalarKind } from "./dsl/types";

export abstract class BindError extends Error {
  public abstract readonly code: string;
  public abstract readonly httpStatus: number;
  public abstract readonly title: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends BindError {
  public readonly code = "BIND_CONFIGURATION_INVALID";
  public readonly httpStatus = 500;
  public readonly title = "Handler Misconfigured";

  /** Offending field keys (empty for arity/record failures). */
  public readonly fields: readonly string[];

  public constructor(message: string, fields: readonly string[] = []) {
    super(message);
    this.fields = fields;
  }
}

export type DecodeFailure = "read_failed" | "malformed_json" | "shape_mismatch";

export class DecodeError extends BindError {
  public readonly code = "BIND_BODY_DECODE_FAILED";
  public readonly httpStatus = 400;
  public readonly title = "Invalid Request Body";

  public readonly reason: DecodeFailure;
  public readonly issues: readonly ZodIssue[];

  public constructor(
    reason: DecodeFailure,
    message: string,
    opts: { cause?: unknown; issues?: readonly ZodIssue[] } = {}
  ) {
    super(message, { cause: opts.cause });
    this.reason = reason;
    this.issues = opts.issues ?? [];
  }
}

export type ValueSource = "path" | "query";

export class CoercionError extends BindError {
  public readonly code = "BIND_COERCION_FAILED";
  public readonly httpStatus = 400;
  public readonly title = "Invalid Parameter";

  public constructor(
    public readonly field: string,
    public readonly kind: ScalarKind,
    public readonly raw: string,
    public readonly source: ValueSource
  ) {
    super(
      `Parameter "${field}" from ${source}: "${raw}" is not a valid ${kind}.`
    );
  }
}

export type QueryRejection = "unknown_key" | "duplicate_scalar";

export class QueryPolicyError extends BindError {
  public readonly code = "BIND_QUERY_REJECTED";
  public readonly httpStatus = 400;
  public readonly title = "Invalid Query String";

  public constructor(
    public readonly key: string,
    public readonly reason: QueryRejection
  ) {
    super(
      reason === "unknown_key"
        ? `Query key "${key}" does not match any parameter.`
        : `Query key "${key}" carries more than one value for a single-valued parameter.`
    );
  }
}
