// backend/services/shared/src/bind/names.ts
/**
 * Purpose:
 * - Single name-normalization rule applied to field names and to external
 *   keys (path and query) before any comparison.
 *
 * Rule:
 * - lowercase, then drop one trailing "[]" ("filterArrInt[]" ≡ "filterarrint").
 */

const ARRAY_SUFFIX = "[]";

export function normalizeKey(raw: string): string {
  const lower = raw.toLowerCase();
  return lower.endsWith(ARRAY_SUFFIX)
    ? lower.slice(0, -ARRAY_SUFFIX.length)
    : lower;
}
