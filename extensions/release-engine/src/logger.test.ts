/**
 * Release engine logging — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { MemoryTransport, createDefaultFormatter, createReleaseLogger, shouldLog } from "./logger.js";

describe("shouldLog", () => {
  it("compares level priorities", () => {
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("fatal", "fatal")).toBe(true);
  });
});

describe("createDefaultFormatter", () => {
  const format = createDefaultFormatter({ colors: false, timestamps: false });

  it("renders level, subsystem, message and context", () => {
    expect(
      format({
        timestamp: new Date("2024-05-01T10:00:00.000Z"),
        level: "info",
        subsystem: "chartwise/hooks",
        message: "hook succeeded",
        release: "shop",
        event: "post-install",
        metadata: { weight: 1 },
      }),
    ).toBe('INFO  [chartwise/hooks] hook succeeded (release=shop event=post-install) {"weight":1}');
  });

  it("prefixes the timestamp when enabled", () => {
    const withTime = createDefaultFormatter({ colors: false, includeMetadata: false });
    expect(
      withTime({
        timestamp: new Date("2024-05-01T10:00:00.000Z"),
        level: "error",
        subsystem: "chartwise",
        message: "boom",
        metadata: { ignored: true },
      }),
    ).toBe("2024-05-01T10:00:00.000Z ERROR [chartwise] boom");
  });
});

describe("ReleaseLogger", () => {
  it("drops entries below its level", () => {
    const memory = new MemoryTransport();
    const logger = createReleaseLogger("chartwise", { level: "warn", transports: [memory] });

    logger.info("quiet");
    logger.warn("loud");
    logger.setLevel("debug");
    logger.debug("now visible");

    expect(memory.messages()).toEqual(["loud", "now visible"]);
    expect(logger.getLevel()).toBe("debug");
  });

  it("nests subsystems and carries context to children", () => {
    const memory = new MemoryTransport();
    const logger = createReleaseLogger("chartwise", { transports: [memory] })
      .withContext({ release: "shop" })
      .child("hooks")
      .withContext({ event: "pre-install" });

    logger.error("failed", { hook: 1 });

    expect(memory.entries).toHaveLength(1);
    expect(memory.entries[0]).toMatchObject({
      level: "error",
      subsystem: "chartwise/hooks",
      message: "failed",
      release: "shop",
      event: "pre-install",
      metadata: { hook: 1 },
    });
    expect(memory.messages("warn")).toEqual([]);
  });
});
