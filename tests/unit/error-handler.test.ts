import { describe, it, expect } from "vitest";
import { handleCliError } from "../../src/lib/error-handler.js";
import {
  CelsheetError,
  ConfigError,
  InvalidSpecError,
  InvalidTimingError,
} from "../../src/lib/errors.js";

describe("handleCliError", () => {
  it("formats celsheet errors with their issues", () => {
    const error = new InvalidSpecError("Invalid cel list", ["1: must be positive", "2: must be an integer"]);

    expect(handleCliError(error)).toEqual({
      exitCode: 1,
      message: "InvalidSpecError: Invalid cel list\n  - 1: must be positive\n  - 2: must be an integer",
    });
  });

  it("formats errors without issues on one line", () => {
    expect(handleCliError(new InvalidTimingError('Invalid iteration count "x"'))).toEqual({
      exitCode: 1,
      message: 'InvalidTimingError: Invalid iteration count "x"',
    });
  });

  it("returns null for foreign errors", () => {
    expect(handleCliError(new Error("boom"))).toBeNull();
    expect(handleCliError("boom")).toBeNull();
  });
});

describe("error classes", () => {
  it("carry codes and share a base class", () => {
    const errors = [
      new InvalidSpecError("a"),
      new InvalidTimingError("b"),
      new ConfigError("c"),
    ];

    expect(errors.map((e) => e.code)).toEqual(["INVALID_SPEC", "INVALID_TIMING", "INVALID_CONFIG"]);
    expect(errors.map((e) => e.name)).toEqual(["InvalidSpecError", "InvalidTimingError", "ConfigError"]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(CelsheetError);
      expect(error).toBeInstanceOf(Error);
      expect(error.issues).toEqual([]);
    }
  });
});
