/**
 * Config validation tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { logConfigSummary, validateConfig, validateConfigOrThrow } from "./validation.js";

describe("validateConfig", () => {
  it("accepts an empty environment", () => {
    expect(validateConfig({})).toEqual([]);
  });

  it("accepts valid window settings", () => {
    expect(validateConfig({ BROWSER_WINDOW_SIZE: "1280x720", BROWSER_WINDOW_POSITION: "-5 0" })).toEqual([]);
  });

  it("reports a window size below one pixel", () => {
    expect(validateConfig({ BROWSER_WINDOW_SIZE: "0x600" })).toEqual([
      {
        field: "BROWSER_WINDOW_SIZE",
        message:
          "'BROWSER_WINDOW_SIZE' must be a Vector2 with (X >= 1, Y >= 1) or either being null. Got: Vector2(0, 600)",
      },
    ]);
  });

  it("reports a password without a user", () => {
    expect(validateConfig({ LOGIN_PASSWORD: "test-secret" })).toEqual([
      { field: "LOGIN_USER", message: "LOGIN_PASSWORD is set but LOGIN_USER is not" },
    ]);
  });
});

describe("validateConfigOrThrow", () => {
  it("lists every problem", () => {
    expect(() => validateConfigOrThrow({ BROWSER_WINDOW_SIZE: "0", LOGIN_PASSWORD: "test-secret" })).toThrow(
      "Configuration validation failed:\n" +
        "  - BROWSER_WINDOW_SIZE: 'BROWSER_WINDOW_SIZE' must be a Vector2 with (X >= 1, Y >= 1) or either being null. Got: Vector2(0, 0)\n" +
        "  - LOGIN_USER: LOGIN_PASSWORD is set but LOGIN_USER is not"
    );
  });

  it("does nothing when valid", () => {
    expect(() => validateConfigOrThrow({ BROWSER_WINDOW_SIZE: "1024" })).not.toThrow();
  });
});

describe("logConfigSummary", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("never prints the password", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    logConfigSummary({ BROWSER_WINDOW_SIZE: "800x600", LOGIN_USER: "alice", LOGIN_PASSWORD: "test-secret" });

    const lines = logSpy.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("[CONFIG]   - BROWSER_WINDOW_SIZE: Vector2(800, 600)");
    expect(lines).toContain("[CONFIG]   - LOGIN_USER: alice");
    expect(lines).toContain("[CONFIG]   - LOGIN_PASSWORD: (set)");
    expect(lines.some((line) => line.includes("test-secret"))).toBe(false);
  });
});
