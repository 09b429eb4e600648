import { afterEach, describe, expect, it, vi } from "vitest";
import { config, debugLog } from "../src/index.js";

describe("debugLog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("should print a prefixed line when debug is on", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    config.set({ debug: true });

    debugLog("compiled 3 patterns");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[lineshape] compiled 3 patterns");
  });

  it("should print nothing and skip the closure when debug is off", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const build = vi.fn(() => "expensive");
    config.set({ debug: false });

    debugLog(build);

    expect(log).not.toHaveBeenCalled();
    expect(build).not.toHaveBeenCalled();
  });

  it("should call the closure when debug is on", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    config.set({ debug: true });

    debugLog(() => "lazy");

    expect(log).toHaveBeenCalledWith("[lineshape] lazy");
  });
});
