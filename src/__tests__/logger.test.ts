import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, Logger, type LogLevel } from "../logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the configured level", () => {
    const seen: Array<[LogLevel, string]> = [];
    const logger = new Logger({ enabled: true, level: "warn", handler: (level, message) => seen.push([level, message]) });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(seen).toEqual([
      ["warn", "w"],
      ["error", "e"],
    ]);
  });

  it("stays quiet when disabled", () => {
    const seen: string[] = [];
    const logger = new Logger({ enabled: false, handler: (_level, message) => seen.push(message) });
    logger.error("nope");
    expect(seen).toEqual([]);
  });

  it("writes prefixed lines to the console", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createLogger({ enabled: true });
    logger.info("index built", { skills: 3 });
    logger.warn("slow");

    expect(log).toHaveBeenCalledWith('[relevance] index built {"skills":3}');
    expect(warn).toHaveBeenCalledWith("[relevance] slow");
  });
});
