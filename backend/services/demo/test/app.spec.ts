// backend/services/demo/test/app.spec.ts
/**
 * End-to-end through the real Express stack (supertest, in process):
 * path params, simple and array query strings, JSON bodies, and the
 * problem responses for rejected requests.
 */

import request from "supertest";
import { describe, it, expect } from "vitest";
import { createApp } from "../src/app";
import { loadDemoConfig } from "../src/config";

const app = createApp(loadDemoConfig({ NODE_ENV: "test" }));
const strictApp = createApp(
  loadDemoConfig({
    NODE_ENV: "test",
    BIND_COERCION: "strict",
    BIND_UNKNOWN_QUERY_KEYS: "reject",
    BIND_DUPLICATE_SCALARS: "reject",
  })
);

describe("GET /user/:id/post/:postId", () => {
  it("binds both path parameters", async () => {
    const res = await request(app).get("/user/1234/post/9876");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 1234, postId: 9876 });
  });

  it("ignores query values for fields the path supplies", async () => {
    const res = await request(app).get("/user/1/post/2?id=99&postId=98");
    expect(res.body).toEqual({ id: 1, postId: 2 });
  });
});

describe("GET /query-strings-simple/:id", () => {
  it.each([
    ["", { id: 1234, filterInt: 0, filterStr: "", filterBool: false }],
    ["?filterInt=10", { id: 1234, filterInt: 10, filterStr: "", filterBool: false }],
    ["?filterInt=10&filterStr=hello", { id: 1234, filterInt: 10, filterStr: "hello", filterBool: false }],
    [
      "?filterInt=20&filterStr=hello&filterBool=true",
      { id: 1234, filterInt: 20, filterStr: "hello", filterBool: true },
    ],
  ])("binds %j", async (query, expected) => {
    const res = await request(app).get(`/query-strings-simple/1234${query}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual(expected);
  });

  it("leaves a malformed integer at zero under the default policy", async () => {
    const res = await request(app).get("/query-strings-simple/1234?filterInt=ten");
    expect(res.status).toBe(200);
    expect(res.body.filterInt).toBe(0);
  });
});

describe("GET /query-strings-arrays/:id", () => {
  it("returns empty arrays when nothing is supplied", async () => {
    const res = await request(app).get("/query-strings-arrays/1234");
    expect(res.body).toEqual({ id: 1234, filterArrInt: [], filterArrStr: [], filterArrBool: [] });
  });

  it("accepts keys with and without []", async () => {
    const plain = await request(app).get("/query-strings-arrays/1234?filterArrInt=1");
    const bracketed = await request(app).get("/query-strings-arrays/1234?filterArrInt[]=1");
    expect(plain.body.filterArrInt).toEqual([1]);
    expect(bracketed.body.filterArrInt).toEqual([1]);
  });

  it("collects every value of every array", async () => {
    const res = await request(app).get(
      "/query-strings-arrays/1234?filterArrInt[]=1&filterArrInt[]=2&filterArrStr[]=hello&filterArrStr[]=world&filterArrBool[]=true&filterArrBool[]=false"
    );
    expect(res.body).toEqual({
      id: 1234,
      filterArrInt: [1, 2],
      filterArrStr: ["hello", "world"],
      filterArrBool: [true, false],
    });
  });
});

describe("POST /user/:id", () => {
  it("binds the path id and the JSON body", async () => {
    const res = await request(app)
      .post("/user/1")
      .set("content-type", "application/json")
      .send(JSON.stringify({ name: "Ada", age: 36 }));
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 1, user: { name: "Ada", age: 36 } });
  });

  it("accepts a numeric string for age", async () => {
    const res = await request(app)
      .post("/user/7")
      .set("content-type", "application/json")
      .send(JSON.stringify({ name: "Ada", age: "27" }));
    expect(res.body).toEqual({ id: 7, user: { name: "Ada", age: 27 } });
  });

  it("answers malformed JSON with a 400 problem", async () => {
    const res = await request(app)
      .post("/user/1")
      .set("content-type", "application/json")
      .set("x-request-id", "req-test-1")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.headers["content-type"]).toBe("application/problem+json; charset=utf-8");
    expect(res.headers["x-request-id"]).toBe("req-test-1");
    expect(res.body).toMatchObject({
      status: 400,
      code: "BIND_BODY_DECODE_FAILED",
      title: "Invalid Request Body",
      requestId: "req-test-1",
      serviceSlug: "demo",
      meta: { reason: "malformed_json", issues: [] },
    });
  });

  it("binds missing body keys as zero values", async () => {
    const res = await request(app)
      .post("/user/1")
      .set("content-type", "application/json")
      .send(JSON.stringify({ age: 3 }));
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 1, user: { name: "", age: 3 } });
  });

  it("answers a body of the wrong shape with its issues", async () => {
    const res = await request(app)
      .post("/user/1")
      .set("content-type", "application/json")
      .send(JSON.stringify({ name: 5 }));
    expect(res.status).toBe(400);
    expect(res.body.meta).toEqual({
      reason: "shape_mismatch",
      issues: [{ path: ["name"], message: "Expected string, received number" }],
    });
  });

  it.each([true, null, "", "27.5", "abc", 27.5])("rejects %j for age", async (age) => {
    const res = await request(app)
      .post("/user/1")
      .set("content-type", "application/json")
      .send(JSON.stringify({ name: "Ada", age }));
    expect(res.status).toBe(400);
    expect(res.body.meta.reason).toBe("shape_mismatch");
    expect(res.body.meta.issues).toHaveLength(1);
    expect(res.body.meta.issues[0].path).toEqual(["age"]);
  });
});

describe("strict binding policy", () => {
  it("rejects a malformed integer", async () => {
    const res = await request(strictApp).get("/query-strings-simple/1234?filterInt=ten");
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      code: "BIND_COERCION_FAILED",
      detail: 'Parameter "filterInt" from query: "ten" is not a valid int.',
      meta: { field: "filterInt", kind: "int", source: "query" },
    });
  });

  it("rejects unknown query keys", async () => {
    const res = await request(strictApp).get("/query-strings-simple/1234?filterint=1&page=2");
    expect(res.status).toBe(400);
    expect(res.body.meta).toEqual({ key: "page", reason: "unknown_key" });
  });

  it("rejects repeated values for a scalar field", async () => {
    const res = await request(strictApp).get("/query-strings-simple/1234?filterInt=1&filterInt=2");
    expect(res.status).toBe(400);
    expect(res.body.meta).toEqual({ key: "filterInt", reason: "duplicate_scalar" });
  });

  it("still binds well-formed requests", async () => {
    const res = await request(strictApp).get("/query-strings-arrays/5?filterArrInt=1&filterArrInt=2");
    expect(res.body).toEqual({ id: 5, filterArrInt: [1, 2], filterArrStr: [], filterArrBool: [] });
  });
});

describe("service tails", () => {
  it("serves health", async () => {
    const res = await request(app).get("/health");
    expect(res.body).toEqual({ service: "demo", version: 1, status: "ok" });
  });

  it("answers unknown routes with a 404 problem", async () => {
    const res = await request(app).get("/nope");
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ status: 404, code: "NOT_FOUND", detail: "No route matches /nope." });
  });

  it("mints a request id when none is supplied", async () => {
    const res = await request(app).get("/health");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });
});
