import { afterEach, describe, expect, it, vi } from "vitest";
import { log, logDebug, logWarn, setLogLevel } from "../modules/core/log";

describe("console logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("writes tagged lines to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    log("loaded touring.json", "cli");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/ \[cli\] loaded touring\.json$/);
  });

  it("filters by level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    logDebug("hidden");
    expect(spy).not.toHaveBeenCalled();

    setLogLevel("debug");
    logDebug("shown");
    expect(spy).toHaveBeenCalledTimes(1);

    setLogLevel("silent");
    logWarn("also hidden");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
