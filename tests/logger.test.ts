/**
 * Tests for logger module.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  configureLogger,
  debug,
  error as logError,
  getLoggerState,
  info,
  resetLogger,
  warn,
} from "../src/core/logger.js";

let captured: string[] = [];

describe("Logger", () => {
  beforeEach(() => {
    resetLogger();
    captured = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      captured.push(args.join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prioritize quiet over debug", () => {
    configureLogger({ quiet: true, debug: true });
    expect(getLoggerState()).toEqual({ quiet: true, debug: false });
  });

  it("should print warnings and info by default", () => {
    warn("test warning");
    info("test info");
    expect(captured).toEqual(["test warning", "test info"]);
  });

  it("should suppress warnings and info with quiet", () => {
    configureLogger({ quiet: true });
    warn("test warning");
    info("test info");
    expect(captured).toEqual([]);
  });

  it("should only print debug when enabled", () => {
    debug("hidden");
    configureLogger({ debug: true });
    debug("shown");
    expect(captured).toEqual(["[DEBUG] shown"]);
  });

  it("should always print errors", () => {
    configureLogger({ quiet: true });
    logError("test error");
    expect(captured).toEqual(["test error"]);
  });

  it("should reset to defaults", () => {
    configureLogger({ debug: true });
    resetLogger();
    expect(getLoggerState()).toEqual({ quiet: false, debug: false });
  });
});
