// backend/services/shared/src/middleware/httpLogger.test.ts
import { pino } from "pino";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { createServiceApp } from "../app/createServiceApp";
import { getLogger } from "../logger/Logger";
import { makeHttpLogger } from "./httpLogger";

// access lines are written on response finish
const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

function capturingApp() {
  const lines: Array<Record<string, unknown>> = [];
  const sink = {
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  };
  const app = createServiceApp({
    serviceName: "access-test",
    serviceVersion: 1,
    envLabel: "test",
    log: getLogger(),
    httpLogger: makeHttpLogger(pino({ level: "info" }, sink), "access-test"),
    mountRoutes: (router) => {
      router.get("/ok", (_req, res) => {
        res.json({ ok: true });
      });
    },
  });
  return { app, lines };
}

describe("makeHttpLogger", () => {
  it("logs completed requests with the service and request id", async () => {
    const { app, lines } = capturingApp();
    await request(app).get("/ok").set("x-request-id", "req-42");
    await settle();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      service: "access-test",
      reqId: "req-42",
      req: { id: "req-42", method: "GET", url: "/ok" },
      res: { statusCode: 200 },
    });
  });

  it("logs 4xx responses as warnings", async () => {
    const { app, lines } = capturingApp();
    await request(app).get("/missing");
    await settle();

    expect(lines[0]).toMatchObject({ level: 40, res: { statusCode: 404 } });
  });

  it("skips health probes", async () => {
    const { app, lines } = capturingApp();
    await request(app).get("/health");
    await settle();

    expect(lines).toEqual([]);
  });
});
