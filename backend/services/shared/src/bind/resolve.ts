// backend/services/shared/src/bind/resolve.ts
/**
 * Purpose:
 * - Flat-Field Resolver: populate every planned field from path parameters,
 *   then the query string, coercing per field kind.
 *
 * Precedence (per field, exactly one source):
 * 1) path lookup by external name; a non-empty value resolves the field
 * 2) query key whose normalized form matches; sequences take every value,
 *    scalars take the first
 * 3) otherwise the zero value ([] for sequences)
 *
 * Notes:
 * - An empty source string never reaches the parser; the field stays at zero.
 * - Unparsable values stay at zero under the lenient policy (known sharp edge)
 *   and throw CoercionError under the strict one.
 */

import type { IBoundLogger } from "../logger/Logger";
import { coerceScalar, zeroValue, type FieldValue } from "./coerce";
import { CoercionError, QueryPolicyError, type ValueSource } from "./errors";
import type { PlannedField } from "./inspect";
import { normalizeKey } from "./names";
import type { BindPolicy } from "./policy";
import type { QueryMultimap, UrlParamLookup } from "./request";

export type ResolvedValue = FieldValue | FieldValue[];
export type ResolvedFields = Record<string, ResolvedValue>;

type QueryMatch = { rawKey: string; values: readonly string[] };

/** First raw key wins when several normalize to the same name. */
function indexQuery(query: QueryMultimap): Map<string, QueryMatch> {
  const index = new Map<string, QueryMatch>();
  for (const [rawKey, values] of query) {
    const key = normalizeKey(rawKey);
    if (!index.has(key)) index.set(key, { rawKey, values });
  }
  return index;
}

function coerceField(
  f: PlannedField,
  raw: string,
  source: ValueSource,
  policy: BindPolicy,
  log: IBoundLogger
): FieldValue {
  if (raw === "") return zeroValue(f.kind);

  const result = coerceScalar(raw, f.kind);
  if (result.ok) return result.value;

  if (policy.coercion === "strict") {
    throw new CoercionError(f.externalName, f.kind, raw, source);
  }
  log.debug(
    { event: "coercion_skip", field: f.key, kind: f.kind, source },
    "unparsable value; field left at zero"
  );
  return zeroValue(f.kind);
}

export function resolveFlatFields(
  fields: readonly PlannedField[],
  query: QueryMultimap,
  getUrlParam: UrlParamLookup,
  policy: BindPolicy,
  log: IBoundLogger
): ResolvedFields {
  const index = indexQuery(query);

  if (policy.unknownQueryKeys === "reject") {
    const known = new Set(fields.map((f) => f.normalized));
    for (const [key, match] of index) {
      if (!known.has(key)) throw new QueryPolicyError(match.rawKey, "unknown_key");
    }
  }

  const out: ResolvedFields = {};
  for (const f of fields) {
    const fromPath = getUrlParam(f.externalName);
    if (fromPath !== "") {
      const value = coerceField(f, fromPath, "path", policy, log);
      out[f.key] = f.sequence ? [value] : value;
      continue;
    }

    const match = index.get(f.normalized);

    if (f.sequence) {
      const values = match?.values ?? [];
      const seq = new Array<FieldValue>(values.length);
      for (let i = 0; i < values.length; i++) {
        seq[i] = coerceField(f, values[i], "query", policy, log);
      }
      out[f.key] = seq;
      continue;
    }

    if (!match || match.values.length === 0) {
      out[f.key] = zeroValue(f.kind);
      continue;
    }
    if (match.values.length > 1 && policy.duplicateScalars === "reject") {
      throw new QueryPolicyError(match.rawKey, "duplicate_scalar");
    }
    out[f.key] = coerceField(f, match.values[0], "query", policy, log);
  }

  return out;
}
