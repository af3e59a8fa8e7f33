// backend/services/shared/src/bind/coerce.ts
/**
 * Purpose:
 * - Convert one non-empty source string into the value of a primitive kind.
 * - Report failure instead of throwing; the resolver applies the policy
 *   (lenient → zero value, strict → CoercionError).
 *
 * Rules:
 * - boolean: 1 t T TRUE true True / 0 f F FALSE false False
 * - integers: base-10 whole number, optional sign, must fit the kind's range
 * - floats: decimal or scientific literal (or inf/infinity/nan), rounded to
 *   the kind's precision; overflow to ±Infinity counts as a failure
 * - string: verbatim
 */

import type { ScalarKind } from "./dsl/types";

export type FieldValue = boolean | number | bigint | string;

export type Coerced = { ok: true; value: FieldValue } | { ok: false };

const TRUE_LITERALS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_LITERALS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_RE = /^([+-]?)(inf|infinity)$/i;
const NAN_RE = /^nan$/i;

type IntRange = { min: bigint; max: bigint; big: boolean };

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

const INT_RANGES: Partial<Record<ScalarKind, IntRange>> = {
  int: { min: -MAX_SAFE, max: MAX_SAFE, big: false },
  int8: { min: -(2n ** 7n), max: 2n ** 7n - 1n, big: false },
  int16: { min: -(2n ** 15n), max: 2n ** 15n - 1n, big: false },
  int32: { min: -(2n ** 31n), max: 2n ** 31n - 1n, big: false },
  int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n, big: true },
  uint: { min: 0n, max: MAX_SAFE, big: false },
  uint8: { min: 0n, max: 2n ** 8n - 1n, big: false },
  uint16: { min: 0n, max: 2n ** 16n - 1n, big: false },
  uint32: { min: 0n, max: 2n ** 32n - 1n, big: false },
  uint64: { min: 0n, max: 2n ** 64n - 1n, big: true },
};

const FAILED: Coerced = { ok: false };

export function zeroValue(kind: ScalarKind): FieldValue {
  switch (kind) {
    case "boolean":
      return false;
    case "string":
      return "";
    case "int64":
    case "uint64":
      return 0n;
    default:
      return 0;
  }
}

function parseBoolean(raw: string): Coerced {
  if (TRUE_LITERALS.has(raw)) return { ok: true, value: true };
  if (FALSE_LITERALS.has(raw)) return { ok: true, value: false };
  return FAILED;
}

function parseInteger(raw: string, range: IntRange): Coerced {
  if (!INTEGER_RE.test(raw)) return FAILED;
  const n = BigInt(raw);
  if (n < range.min || n > range.max) return FAILED;
  return { ok: true, value: range.big ? n : Number(n) };
}

function parseFloating(raw: string, single: boolean): Coerced {
  const inf = INFINITY_RE.exec(raw);
  if (inf) {
    return { ok: true, value: inf[1] === "-" ? -Infinity : Infinity };
  }
  if (NAN_RE.test(raw)) return { ok: true, value: NaN };
  if (!DECIMAL_RE.test(raw)) return FAILED;

  const n = single ? Math.fround(Number(raw)) : Number(raw);
  if (!Number.isFinite(n)) return FAILED;
  return { ok: true, value: n };
}

export function coerceScalar(raw: string, kind: ScalarKind): Coerced {
  switch (kind) {
    case "string":
      return { ok: true, value: raw };
    case "boolean":
      return parseBoolean(raw);
    case "float32":
      return parseFloating(raw, true);
    case "float64":
      return parseFloating(raw, false);
    default: {
      const range = INT_RANGES[kind];
      return range ? parseInteger(raw, range) : FAILED;
    }
  }
}
