import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./error-format.js";
import {
  MissingScriptError,
  NetworkError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "./errors.js";

describe("formatErrorLines", () => {
  it("maps updater errors to titled lines with a hint", () => {
    const lines = formatErrorLines(new MissingScriptError("/profile/user.js"));

    expect(lines).toEqual([
      { kind: "title", text: "Profile script missing." },
      { kind: "message", text: "user.js not detected in the profile directory." },
      {
        kind: "hint",
        text: "Hint: Run the updater from your Firefox profile directory, or pass --dir.",
      },
    ]);
  });

  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: "Missing config value",
      hint: "Pass --dir",
      next: "Re-run the updater",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[3]?.text).toBe("Next: Re-run the updater");
  });

  it("includes the code and underlying cause in debug mode", () => {
    const error = new NetworkError("Failed to fetch https://example.test: fetch failed", new Error("ECONNRESET"));

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.find((line) => line.kind === "code")?.text).toBe("Code: NETWORK_ERROR");
    expect(lines.find((line) => line.kind === "cause")?.text).toBe("Cause: ECONNRESET");
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("NetworkError");
  });

  it("defaults unknown inputs to a generic title", () => {
    const lines = formatErrorLines("boom");

    expect(lines).toEqual([
      { kind: "title", text: "An error occurred during execution." },
      { kind: "message", text: "boom" },
    ]);
  });
});

describe("renderErrorLines", () => {
  it("joins plain lines when color is disabled", () => {
    expect(renderErrorLines(new Error("disk full"))).toBe(
      "An error occurred during execution.\ndisk full",
    );
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: false }, useColor: true })).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(createAnsiFormatter(false)("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    expect(createAnsiFormatter(true)("alert", ["bold", "red"])).toBe("\x1b[1m\x1b[31malert\x1b[0m");
  });
});
