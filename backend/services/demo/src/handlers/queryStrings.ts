// backend/services/demo/src/handlers/queryStrings.ts
/**
 * Query-string handlers.
 * - Simple: one value per key; the path supplies `id`.
 * - Arrays: every value of a key, in order. `filterArrInt` and
 *   `filterArrInt[]` address the same field.
 */

import { defineHandler, field, type BindPolicy } from "@bindparams/shared";

export const simpleFilters = {
  id: field.int(),
  filterInt: field.int(),
  filterStr: field.string(),
  filterBool: field.boolean(),
};

export const arrayFilters = {
  id: field.int(),
  filterArrInt: field.array(field.int()),
  filterArrStr: field.array(field.string()),
  filterArrBool: field.array(field.boolean()),
};

export function querySimpleHandler(policy: Partial<BindPolicy> = {}) {
  return defineHandler(
    { params: simpleFilters },
    function querySimple(params) {
      return [params] as const;
    },
    policy
  );
}

export function queryArraysHandler(policy: Partial<BindPolicy> = {}) {
  return defineHandler(
    { params: arrayFilters },
    function queryArrays(params) {
      return [params] as const;
    },
    policy
  );
}
