import { describe, it, expect } from "vitest";
import {
  RangeMinError,
  InvalidTypeError,
  EmptyInputError,
  IndexOutOfBoundsError,
  InvalidRangeError,
} from "./errors.js";

describe("errors", () => {
  it("should carry stable names and codes", () => {
    const cases: Array<[RangeMinError, string, string]> = [
      [new InvalidTypeError("bad"), "InvalidTypeError", "INVALID_TYPE"],
      [new EmptyInputError(), "EmptyInputError", "EMPTY_INPUT"],
      [new IndexOutOfBoundsError(7, 5), "IndexOutOfBoundsError", "INDEX_OUT_OF_BOUNDS"],
      [new InvalidRangeError(3, 1), "InvalidRangeError", "INVALID_RANGE"],
    ];

    for (const [err, name, code] of cases) {
      expect(err).toBeInstanceOf(RangeMinError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe(name);
      expect(err.code).toBe(code);
    }
  });

  it("should describe out-of-bounds indices", () => {
    const err = new IndexOutOfBoundsError(7, 5);
    expect(err.message).toBe("Index 7 is out of bounds for size 5");
    expect(err.index).toBe(7);
    expect(err.size).toBe(5);
  });

  it("should describe inverted ranges", () => {
    const err = new InvalidRangeError(3, 1);
    expect(err.message).toBe("Left index 3 cannot be greater than right index 1");
    expect(err.left).toBe(3);
    expect(err.right).toBe(1);
  });

  it("should support cause", () => {
    const cause = new Error("underlying");
    const err = new InvalidTypeError("wrapper", { cause });
    expect(err.cause).toBe(cause);
  });
});
