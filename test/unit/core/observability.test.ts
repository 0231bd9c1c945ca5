import { describe, it, expect } from "vitest";
import { Logger, ObservabilityProvider, defaultLogLevel, isLogLevel } from "../../../src/core/observability.js";

function entries(lines: readonly string[]): unknown[] {
  return lines.map((line): unknown => JSON.parse(line));
}

describe("Logger", () => {
  it("writes one JSON line per entry", () => {
    const lines: string[] = [];
    const logger = new Logger("orchestrator", "debug", (line) => lines.push(line));

    logger.info("Agent started", { agentId: "agent-1" });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith("\n")).toBe(true);
    expect(entries(lines)[0]).toMatchObject({
      level: "info",
      component: "orchestrator",
      message: "Agent started",
      data: { agentId: "agent-1" },
    });
  });

  it("drops entries below the minimum level", () => {
    const lines: string[] = [];
    const logger = new Logger("x", "warn", (line) => lines.push(line));

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    logger.fatal("e");

    expect(entries(lines).map((e) => (typeof e === "object" && e !== null && "message" in e ? e.message : null))).toEqual([
      "c",
      "d",
      "e",
    ]);
  });

  it("passes its trace id and writer to children", () => {
    const lines: string[] = [];
    const logger = new Logger("superintendent", "info", (line) => lines.push(line));
    logger.setTraceId("trace-1");

    logger.child("steps").info("Dispatching step");

    expect(entries(lines)[0]).toMatchObject({ component: "superintendent.steps", traceId: "trace-1" });
  });

  it("omits absent data and trace ids", () => {
    const lines: string[] = [];
    new Logger("x", "info", (line) => lines.push(line)).info("plain");
    expect(Object.keys(JSON.parse(lines[0] ?? "{}"))).toEqual(["timestamp", "level", "component", "message"]);
  });
});

describe("log levels", () => {
  it("recognises level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
  });

  it("reads the default level from the environment", () => {
    expect(defaultLogLevel({})).toBe("info");
    expect(defaultLogLevel({ SUPERINTENDENT_LOG_LEVEL: " DEBUG " })).toBe("debug");
    expect(defaultLogLevel({ SUPERINTENDENT_LOG_LEVEL: "chatty" })).toBe("info");
  });

  it("creates loggers at the provider's level", () => {
    const lines: string[] = [];
    const logger = new ObservabilityProvider("error", (line) => lines.push(line)).createLogger("cli");

    logger.warn("skipped");
    logger.error("kept");

    expect(entries(lines)).toHaveLength(1);
  });
});
