// backend/services/shared/src/bind/inspect.ts
/**
 * Purpose:
 * - Shape Inspector: validate a handler's declared signature once, at
 *   registration, and derive the field plan the resolver walks per request.
 *
 * Invariants:
 * - Arity is 1 (params) or 2 (params + body); the handler function may not
 *   declare more parameters than that.
 * - params is a record whose fields are primitives or arrays of primitives.
 * - body, when present, is a zod schema.
 * - Any violation throws ConfigurationError before request data is touched.
 *
 * Notes:
 * - Plans are cached per params object identity; a shape reused across
 *   handlers is inspected once.
 */

import { ZodType, type ZodTypeAny } from "zod";
import type { ScalarKind } from "./dsl/types";
import { ConfigurationError } from "./errors";
import { normalizeKey } from "./names";

export type PlannedField = {
  /** Property key on the resolved params object. */
  key: string;
  /** Name matched against path/query keys (annotation or key). */
  externalName: string;
  normalized: string;
  /** Scalar kind, or the element kind for sequences. */
  kind: ScalarKind;
  sequence: boolean;
};

export type BindingPlan = {
  arity: 1 | 2;
  fields: readonly PlannedField[];
  body?: ZodTypeAny;
};

const SCALAR_KINDS: ReadonlySet<string> = new Set<ScalarKind>([
  "boolean",
  "string",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "float32",
  "float64",
]);

const planCache = new WeakMap<object, readonly PlannedField[]>();

function isRecord(x: unknown): x is Record<string, unknown> {
  if (x === null || typeof x !== "object" || Array.isArray(x)) return false;
  const proto: unknown = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

function isScalarKind(x: unknown): x is ScalarKind {
  return typeof x === "string" && SCALAR_KINDS.has(x);
}

function describeKind(descriptor: unknown): string {
  if (!isRecord(descriptor)) return typeof descriptor;
  const kind = descriptor["kind"];
  if (kind === "array" && isRecord(descriptor["of"])) {
    return `array of ${describeKind(descriptor["of"])}`;
  }
  return typeof kind === "string" ? kind : "unknown";
}

function planField(key: string, descriptor: unknown): PlannedField | null {
  if (!isRecord(descriptor)) return null;

  const name = descriptor["name"];
  const externalName = typeof name === "string" && name !== "" ? name : key;

  let kind: unknown = descriptor["kind"];
  let sequence = false;
  if (kind === "array") {
    const of = descriptor["of"];
    kind = isRecord(of) ? of["kind"] : undefined;
    sequence = true;
  }
  if (!isScalarKind(kind)) return null;

  return {
    key,
    externalName,
    normalized: normalizeKey(externalName),
    kind,
    sequence,
  };
}

export function inspectFlatShape(params: unknown): readonly PlannedField[] {
  if (!isRecord(params)) {
    const got = Array.isArray(params)
      ? "array"
      : params === null
      ? "null"
      : typeof params;
    throw new ConfigurationError(
      `First input must be a record of fields (got ${got}).`
    );
  }

  const cached = planCache.get(params);
  if (cached) return cached;

  // Resolved values are written by key into a plain object.
  if (Object.hasOwn(params, "__proto__")) {
    throw new ConfigurationError(
      `Field key "__proto__" is reserved; use another key with { name: "__proto__" }.`,
      ["__proto__"]
    );
  }

  const fields: PlannedField[] = [];
  const unsupported: string[] = [];
  const details: string[] = [];
  for (const [key, descriptor] of Object.entries(params)) {
    const planned = planField(key, descriptor);
    if (planned) {
      fields.push(planned);
      continue;
    }
    unsupported.push(key);
    details.push(`${key} (${describeKind(descriptor)})`);
  }

  if (unsupported.length > 0) {
    throw new ConfigurationError(
      `First input may only hold primitive or primitive-array fields; unsupported: ${details.join(", ")}.`,
      unsupported
    );
  }

  const frozen = Object.freeze(fields);
  planCache.set(params, frozen);
  return frozen;
}

export function inspectSignature(signature: unknown, fn: unknown): BindingPlan {
  if (typeof fn !== "function") {
    throw new ConfigurationError("Handler must be a function.");
  }
  if (!isRecord(signature) || signature["params"] === undefined) {
    throw new ConfigurationError(
      "Handler must declare one or two inputs: { params } or { params, body }."
    );
  }

  const body = signature["body"];
  const arity: 1 | 2 = body === undefined ? 1 : 2;
  if (fn.length > arity) {
    throw new ConfigurationError(
      `Handler declares ${fn.length} parameters but only ${arity} input shape(s); expected one or two.`
    );
  }

  const fields = inspectFlatShape(signature["params"]);

  if (body === undefined) return { arity, fields };
  if (!(body instanceof ZodType)) {
    throw new ConfigurationError("Second input (body) must be a zod schema.");
  }
  return { arity, fields, body };
}
