import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, parseLogLevel, setLogLevel } from "./logger";

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" warn ")).toBe("warn");
  });

  it("defaults to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});

describe("logger", () => {
  beforeEach(() => {
    setLogLevel("info");
  });

  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("writes JSON lines with the data merged in", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("reconnected", { host: "gerrit.test" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      level: "info",
      msg: "reconnected",
      host: "gerrit.test",
    });
  });

  it("sends errors to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("fatal error");
    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({ level: "error", msg: "fatal error" });
  });

  it("drops lines below the threshold", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("warn");
    logger.info("hidden");
    logger.debug("hidden");
    logger.warn("shown");
    expect(log).toHaveBeenCalledTimes(1);
  });
});
