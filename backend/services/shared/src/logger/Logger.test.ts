// backend/services/shared/src/logger/Logger.test.ts
import { describe, it, expect } from "vitest";
import { getLogger, isLogLevel, setLogLevel, setRootLogger, type ILogger } from "./Logger";

type Line = { level: string; obj: Record<string, unknown>; msg?: string; rest: unknown[] };

function capture(): { root: ILogger; lines: Line[] } {
  const lines: Line[] = [];
  const sink =
    (level: string) =>
    (obj: Record<string, unknown>, msg?: string, ...rest: unknown[]) => {
      lines.push({ level, obj, msg, rest });
    };
  return {
    lines,
    root: { debug: sink("debug"), info: sink("info"), warn: sink("warn"), error: sink("error") },
  };
}

describe("Logger", () => {
  it("merges bound context into every line", () => {
    const { root, lines } = capture();
    setRootLogger(root);
    setLogLevel("info");

    getLogger({ service: "demo" }).bind({ handler: "createUser" }).info({ status: 400 }, "rejected");

    expect(lines).toEqual([
      {
        level: "info",
        obj: { service: "demo", handler: "createUser", status: 400 },
        msg: "rejected",
        rest: [],
      },
    ]);
  });

  it("accepts (msg, meta) as well as (meta, msg)", () => {
    const { root, lines } = capture();
    setRootLogger(root);
    setLogLevel("info");

    getLogger({ a: 1 }).warn("slow", { ms: 12 }, "extra");

    expect(lines[0]).toEqual({
      level: "warn",
      obj: { a: 1, ms: 12 },
      msg: "slow",
      rest: ["extra"],
    });
  });

  it("drops lines below the current level", () => {
    const { root, lines } = capture();
    setRootLogger(root);
    setLogLevel("warn");

    const log = getLogger();
    log.debug("d");
    log.info("i");
    log.warn("w");
    log.error("e");

    expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
  });

  it("writes nothing when silent", () => {
    const { root, lines } = capture();
    setRootLogger(root);
    setLogLevel("silent");

    getLogger().error("boom");
    expect(lines).toEqual([]);
  });

  it("adds the call origin to debug lines", () => {
    const { root, lines } = capture();
    setRootLogger(root);
    setLogLevel("debug");

    getLogger().debug({ event: "plan_built" }, "inspected");

    expect(lines[0].obj.event).toBe("plan_built");
    expect(lines[0].obj).toHaveProperty("origin");
  });

  it("follows a root swapped after the logger was created", () => {
    setLogLevel("info");
    const log = getLogger();
    const { root, lines } = capture();
    setRootLogger(root);

    log.info("late");
    expect(lines).toHaveLength(1);
  });

  it("serializes errors and non-errors", () => {
    const log = getLogger();
    const err = new TypeError("bad");
    expect(log.serializeError(err)).toEqual({
      name: "TypeError",
      message: "bad",
      stack: err.stack,
    });
    expect(log.serializeError(42)).toEqual({ message: "42" });
  });

  it("recognizes level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
