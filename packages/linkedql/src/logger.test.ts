import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, NOOP_LOGGER } from "./logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages and forwards metadata", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createConsoleLogger({ prefix: "Registry", level: "debug" });

    logger.debug("Registered item type", { typeName: "Foo" });
    logger.error("Registry configuration failed");

    expect(debug).toHaveBeenCalledWith("[Registry] Registered item type", { typeName: "Foo" });
    expect(error).toHaveBeenCalledWith("[Registry] Registry configuration failed", "");
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[LinkedQL] shown", "");
  });

  it("defaults to the info level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = createConsoleLogger();

    logger.debug("hidden");
    logger.info("ready");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith("[LinkedQL] ready", "");
  });
});

describe("NOOP_LOGGER", () => {
  it("swallows every level", () => {
    expect(NOOP_LOGGER.warn("ignored")).toBeUndefined();
  });
});
