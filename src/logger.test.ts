import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prefix lines with the level and the component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("SessionRouter");

    logger.info("Session 42 reset", { extra: true });

    expect(log).toHaveBeenCalledWith("[INFO] [SessionRouter] Session 42 reset", { extra: true });
  });

  it("should route warnings and errors to the matching console methods", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("Bot");

    logger.warn("slow");
    logger.error("down");

    expect(warn).toHaveBeenCalledWith("[WARN] [Bot] slow");
    expect(error).toHaveBeenCalledWith("[ERROR] [Bot] down");
  });

  it("should drop messages below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("Server", "warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] [Server] shown");
  });

  it("should emit debug lines when the level allows it", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    createLogger("Bot", "debug").debug("update 1");
    expect(debug).toHaveBeenCalledWith("[DEBUG] [Bot] update 1");
  });
});

describe("isLogLevel", () => {
  it("should accept the four levels only", () => {
    expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
