import { describe, it, expect, vi, afterEach } from "vitest";
import { consoleLogger } from "./logger";

describe("consoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes each level to the matching console method", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    consoleLogger.log("warn", "unknown filesystem provider %s", "9");
    consoleLogger.log("error", "unable to convert v4 filesystem for user %s: %s", "alice", "boom");

    expect(warn).toHaveBeenCalledWith("unknown filesystem provider %s", "9");
    expect(error).toHaveBeenCalledWith("unable to convert v4 filesystem for user %s: %s", "alice", "boom");
  });
});
