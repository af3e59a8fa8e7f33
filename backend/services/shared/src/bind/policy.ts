// backend/services/shared/src/bind/policy.ts
/**
 * Purpose:
 * - Per-handler binding policy. The defaults are the lenient ones
 *   (zero on failure, ignore, first); each switch can be tightened independently.
 *
 * - coercion:         "lenient" leaves unparsable values at zero; "strict" throws CoercionError
 * - unknownQueryKeys: "ignore" drops keys that match no field; "reject" throws QueryPolicyError
 * - duplicateScalars: "first" keeps the first value; "reject" throws QueryPolicyError
 */

export type BindPolicy = {
  coercion: "lenient" | "strict";
  unknownQueryKeys: "ignore" | "reject";
  duplicateScalars: "first" | "reject";
};

export const DEFAULT_BIND_POLICY: Readonly<BindPolicy> = Object.freeze({
  coercion: "lenient",
  unknownQueryKeys: "ignore",
  duplicateScalars: "first",
});

export const STRICT_BIND_POLICY: Readonly<BindPolicy> = Object.freeze({
  coercion: "strict",
  unknownQueryKeys: "reject",
  duplicateScalars: "reject",
});

export function resolvePolicy(overrides: Partial<BindPolicy> = {}): BindPolicy {
  return { ...DEFAULT_BIND_POLICY, ...overrides };
}
