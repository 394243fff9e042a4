import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger("warn");
    logger.debug("hidden");
    logger.info("hidden");
    expect(log).not.toHaveBeenCalled();
  });

  it("prints debug messages at debug level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("debug").debug("wrote hello.html");
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining("wrote hello.html"));
  });

  it("always prints errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    new Logger("error").error("boom");
    expect(error).toHaveBeenCalledTimes(1);
  });
});
