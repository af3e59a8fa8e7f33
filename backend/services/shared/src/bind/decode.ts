// backend/services/shared/src/bind/decode.ts
/**
 * Purpose:
 * - Body Decoder: read the whole body once, parse JSON, and validate it
 *   structurally against the handler's zod schema.
 *
 * Invariants:
 * - The body stream is iterated exactly once.
 * - Every failure surfaces as DecodeError; nothing is recovered here.
 * - Object keys match the schema case-insensitively; an exact match wins over
 *   a folded one, and among folded candidates the first in the document wins.
 *   Folding sees through wrappers (optional, default, catch, effects, pipe,
 *   lazy, readonly, brand) and descends into arrays, records, unions and
 *   intersections.
 *   Unknown keys are whatever the schema says (zod objects strip them).
 */

import {
  ZodArray,
  ZodBranded,
  ZodCatch,
  ZodDefault,
  ZodDiscriminatedUnion,
  ZodEffects,
  ZodIntersection,
  ZodLazy,
  ZodNullable,
  ZodObject,
  ZodOptional,
  ZodPipeline,
  ZodReadonly,
  ZodRecord,
  ZodUnion,
  type ZodTypeAny,
  type output,
} from "zod";
import { DecodeError } from "./errors";
import type { BodySource } from "./request";

export async function readBodyText(body: BodySource): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of body) {
      if (typeof chunk === "string") chunks.push(Buffer.from(chunk, "utf8"));
      else chunks.push(Buffer.from(chunk));
    }
  } catch (err) {
    throw new DecodeError(
      "read_failed",
      `Request body could not be read: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return Buffer.concat(chunks).toString("utf8");
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return x !== null && typeof x === "object" && !Array.isArray(x);
}

/** Peel wrappers that do not change which object keys a schema reads. */
function unwrap(schema: ZodTypeAny): ZodTypeAny {
  if (schema instanceof ZodOptional || schema instanceof ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof ZodReadonly) return unwrap(schema.unwrap());
  if (schema instanceof ZodBranded) return unwrap(schema.unwrap());
  if (schema instanceof ZodDefault) return unwrap(schema.removeDefault());
  if (schema instanceof ZodCatch) return unwrap(schema.removeCatch());
  if (schema instanceof ZodEffects) return unwrap(schema.innerType());
  if (schema instanceof ZodPipeline) return unwrap(schema._def.in);
  if (schema instanceof ZodLazy) return unwrap(schema.schema);
  return schema;
}

function foldObject(
  json: Record<string, unknown>,
  shape: Record<string, ZodTypeAny>
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...json };
  for (const [key, child] of Object.entries(shape)) {
    if (!Object.hasOwn(json, key)) {
      const lower = key.toLowerCase();
      const folded = Object.keys(json).find(
        (k) => k.toLowerCase() === lower && !Object.hasOwn(shape, k)
      );
      if (folded !== undefined) {
        out[key] = json[folded];
        delete out[folded];
      }
    }
    if (Object.hasOwn(out, key)) out[key] = foldKeys(out[key], child);
  }
  return out;
}

/** First option whose folded value it accepts; the input unchanged if none does. */
function foldUnion(json: unknown, options: readonly ZodTypeAny[]): unknown {
  for (const option of options) {
    const folded = foldKeys(json, option);
    if (option.safeParse(folded).success) return folded;
  }
  return json;
}

/** Rename keys that differ from the schema's only by case. Returns a copy. */
export function foldKeys(json: unknown, schema: ZodTypeAny): unknown {
  const target = unwrap(schema);

  if (target instanceof ZodUnion || target instanceof ZodDiscriminatedUnion) {
    const options: readonly ZodTypeAny[] = target.options;
    return foldUnion(json, options);
  }
  if (target instanceof ZodIntersection) {
    const left: ZodTypeAny = target._def.left;
    const right: ZodTypeAny = target._def.right;
    return foldKeys(foldKeys(json, left), right);
  }
  if (target instanceof ZodArray && Array.isArray(json)) {
    const element: ZodTypeAny = target.element;
    return json.map((item) => foldKeys(item, element));
  }
  if (!isPlainObject(json)) return json;

  if (target instanceof ZodRecord) {
    const valueSchema: ZodTypeAny = target.valueSchema;
    return Object.fromEntries(
      Object.entries(json).map(([k, v]) => [k, foldKeys(v, valueSchema)])
    );
  }
  if (target instanceof ZodObject) {
    const shape: Record<string, ZodTypeAny> = target.shape;
    return foldObject(json, shape);
  }
  return json;
}

export function parseBodyJson<S extends ZodTypeAny>(
  text: string,
  schema: S
): output<S> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(
      "malformed_json",
      text.trim() === ""
        ? "Request body is empty; expected JSON."
        : `Request body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  const parsed = schema.safeParse(foldKeys(json, schema));
  if (!parsed.success) {
    throw new DecodeError(
      "shape_mismatch",
      "Request body does not match the expected shape.",
      { cause: parsed.error, issues: parsed.error.issues }
    );
  }
  return parsed.data;
}

export async function decodeBody<S extends ZodTypeAny>(
  body: BodySource,
  schema: S
): Promise<output<S>> {
  return parseBodyJson(await readBodyText(body), schema);
}
