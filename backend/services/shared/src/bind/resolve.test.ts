// backend/services/shared/src/bind/resolve.test.ts
import { describe, it, expect } from "vitest";
import { getLogger } from "../logger/Logger";
import { field } from "./dsl/field";
import type { FieldsShape } from "./dsl/types";
import { CoercionError, QueryPolicyError } from "./errors";
import { inspectFlatShape } from "./inspect";
import { DEFAULT_BIND_POLICY, STRICT_BIND_POLICY, resolvePolicy, type BindPolicy } from "./policy";
import { paramLookupFrom, queryFromUrl, type UrlParamLookup } from "./request";
import { resolveFlatFields } from "./resolve";

const log = getLogger({ test: "resolve" });
const noPath: UrlParamLookup = () => "";

function resolve(
  shape: FieldsShape,
  url: string,
  getUrlParam: UrlParamLookup = noPath,
  policy: BindPolicy = DEFAULT_BIND_POLICY
) {
  return resolveFlatFields(inspectFlatShape(shape), queryFromUrl(url), getUrlParam, policy, log);
}

const simple = {
  id: field.int(),
  filterInt: field.int(),
  filterStr: field.string(),
  filterBool: field.boolean(),
};

const arrays = {
  filterArrInt: field.array(field.int()),
  filterArrStr: field.array(field.string()),
  filterArrBool: field.array(field.boolean()),
};

describe("resolveFlatFields: sources", () => {
  it("leaves every field at zero when nothing matches", () => {
    expect(resolve(simple, "/x")).toEqual({
      id: 0,
      filterInt: 0,
      filterStr: "",
      filterBool: false,
    });
    expect(resolve(arrays, "/x")).toEqual({
      filterArrInt: [],
      filterArrStr: [],
      filterArrBool: [],
    });
  });

  it("matches query keys case-insensitively", () => {
    expect(resolve(simple, "/x?FILTERINT=20&filterstr=hello&FilterBool=true")).toEqual({
      id: 0,
      filterInt: 20,
      filterStr: "hello",
      filterBool: true,
    });
  });

  it("takes path values before the query", () => {
    const path = paramLookupFrom([["id", "1234"]]);
    expect(resolve(simple, "/x?id=99&filterInt=10", path)).toEqual({
      id: 1234,
      filterInt: 10,
      filterStr: "",
      filterBool: false,
    });
  });

  it("falls through to the query when the path value is empty", () => {
    const path = paramLookupFrom([["id", ""]]);
    expect(resolve({ id: field.int() }, "/x?id=7", path)).toEqual({ id: 7 });
  });

  it("uses the external name for both path and query lookups", () => {
    const shape = { postId: field.int({ name: "post_id" }), q: field.string({ name: "search" }) };
    const path = paramLookupFrom([["POST_ID", "9876"]]);
    expect(resolve(shape, "/x?postId=1&Search=abc", path)).toEqual({
      postId: 9876,
      q: "abc",
    });
  });

  it("wraps a path value for a sequence field in a one-element array", () => {
    const path = paramLookupFrom([["filterArrInt", "5"]]);
    expect(resolve(arrays, "/x?filterArrInt=1&filterArrInt=2", path).filterArrInt).toEqual([5]);
  });
});

describe("resolveFlatFields: sequences", () => {
  it("collects every value in order, with or without []", () => {
    expect(
      resolve(arrays, "/x?filterArrInt[]=1&filterArrInt[]=2&filterArrStr=hello&filterArrStr=world&filterArrBool[]=true")
    ).toEqual({
      filterArrInt: [1, 2],
      filterArrStr: ["hello", "world"],
      filterArrBool: [true],
    });
  });

  it("uses the first raw key when several normalize to the same field", () => {
    expect(resolve(arrays, "/x?filterArrInt=1&filterArrInt[]=2&filterArrInt[]=3").filterArrInt).toEqual([1]);
    expect(resolve(arrays, "/x?filterArrInt[]=2&filterArrInt=1&filterArrInt[]=3").filterArrInt).toEqual([2, 3]);
  });

  it("keeps zero values in place for empty or unparsable elements", () => {
    expect(resolve(arrays, "/x?filterArrInt=1&filterArrInt=&filterArrInt=x&filterArrInt=4").filterArrInt).toEqual([
      1, 0, 0, 4,
    ]);
  });

  it("returns a fresh array per call", () => {
    const a = resolve(arrays, "/x?filterArrInt=1");
    const b = resolve(arrays, "/x?filterArrInt=1");
    expect(a.filterArrInt).not.toBe(b.filterArrInt);
  });
});

describe("resolveFlatFields: scalars", () => {
  it("takes the first of several values", () => {
    expect(resolve({ filterInt: field.int() }, "/x?filterInt=1&filterInt=2")).toEqual({ filterInt: 1 });
  });

  it("skips coercion for an empty value", () => {
    expect(resolve({ filterInt: field.int() }, "/x?filterInt=")).toEqual({ filterInt: 0 });
  });

  it("leaves an unparsable value at zero under the lenient policy", () => {
    // lenient coercion hides malformed input: "abc" and "10x" bind as 0
    expect(resolve(simple, "/x?filterInt=abc&filterBool=yes")).toEqual({
      id: 0,
      filterInt: 0,
      filterStr: "",
      filterBool: false,
    });
    expect(resolve({ n: field.int() }, "/x?n=10x")).toEqual({ n: 0 });
  });

  it("binds 64-bit kinds as bigint", () => {
    expect(resolve({ big: field.int64() }, "/x?big=-9007199254740993")).toEqual({
      big: -9007199254740993n,
    });
  });
});

describe("resolveFlatFields: strict policies", () => {
  it("throws CoercionError naming the field, kind and source", () => {
    const strict = resolvePolicy({ coercion: "strict" });
    let caught: unknown;
    try {
      resolve(simple, "/x?filterInt=abc", noPath, strict);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CoercionError);
    expect(caught).toMatchObject({
      field: "filterInt",
      kind: "int",
      raw: "abc",
      source: "query",
      httpStatus: 400,
    });
  });

  it("reports path failures with source path", () => {
    const strict = resolvePolicy({ coercion: "strict" });
    const path = paramLookupFrom([["id", "x1"]]);
    expect(() => resolve(simple, "/x", path, strict)).toThrow(
      'Parameter "id" from path: "x1" is not a valid int.'
    );
  });

  it("still maps empty values to zero under strict coercion", () => {
    expect(resolve({ n: field.int() }, "/x?n=", noPath, STRICT_BIND_POLICY)).toEqual({ n: 0 });
  });

  it("rejects unknown query keys by raw spelling", () => {
    const policy = resolvePolicy({ unknownQueryKeys: "reject" });
    expect(() => resolve(simple, "/x?filterInt=1&Extra[]=2", noPath, policy)).toThrow(
      new QueryPolicyError("Extra[]", "unknown_key")
    );
    expect(resolve(simple, "/x?filterint[]=1", noPath, policy).filterInt).toBe(1);
  });

  it("rejects several values for a scalar field", () => {
    const policy = resolvePolicy({ duplicateScalars: "reject" });
    expect(() => resolve(simple, "/x?filterInt=1&filterInt=2", noPath, policy)).toThrow(
      'Query key "filterInt" carries more than one value for a single-valued parameter.'
    );
    expect(resolve(arrays, "/x?filterArrInt=1&filterArrInt=2", noPath, policy).filterArrInt).toEqual([1, 2]);
  });
});
