import { describe, expect, it } from "vitest";
import { createLogger, logger } from "../src/logger";

describe("createLogger", () => {
  it("builds a logger at the requested level without touching the root", () => {
    const before = logger.level;
    const scoped = createLogger("scheduling-service", before === "debug" ? "error" : "debug");

    expect(scoped.level).toBe(before === "debug" ? "error" : "debug");
    expect(logger.level).toBe(before);
  });

  it("derives a child of the root logger when no level is given", () => {
    expect(createLogger("agent-runtime").level).toBe(logger.level);
  });
});
