import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationManager } from "./config.js";
import { Logger, getDefaultLogger } from "./logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should be disabled by default", () => {
    const logger = new Logger(ConfigurationManager.createDefault().logging);
    expect(logger.isEnabled("QUERY_STARTED")).toBe(false);
  });

  it("should share one disabled default logger", () => {
    expect(getDefaultLogger()).toBe(getDefaultLogger());
    expect(getDefaultLogger().isEnabled("PROGRAM_LOADED")).toBe(false);
  });

  it("should honour allowed and denied ids", () => {
    const logger = new Logger({
      enabled: true,
      allowedIds: new Set(["A", "B"]),
      deniedIds: new Set(["B"]),
    });
    expect(logger.isEnabled("A")).toBe(true);
    expect(logger.isEnabled("B")).toBe(false);
    expect(logger.isEnabled("C")).toBe(false);
  });

  it("should only build lazy data for enabled ids", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({
      enabled: true,
      allowedIds: new Set(),
      deniedIds: new Set(["QUIET"]),
    });
    const thunk = vi.fn(() => "data");

    logger.log("QUIET", thunk);
    expect(thunk).not.toHaveBeenCalled();

    logger.log("LOUD", thunk);
    expect(thunk).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith("[LOUD] data");
  });
});

describe("ConfigurationManager", () => {
  it("should merge logging overrides over the defaults", () => {
    const config = ConfigurationManager.create({ logging: { enabled: true } });
    expect(config.logging.enabled).toBe(true);
    expect([...config.logging.deniedIds]).toEqual(["RELATION_CALLED"]);
    expect(config.query.defaultLimit).toBe(Infinity);
  });
});
