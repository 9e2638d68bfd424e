import { describe, expect, it } from "vitest";

import { createLogger, silentLogger } from "./logger.js";

describe("createLogger", () => {
  it("builds a logger at the requested level", () => {
    const logger = createLogger("warn");

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("keeps the default logger quiet", () => {
    expect(silentLogger.level).toBe("silent");
  });
});
