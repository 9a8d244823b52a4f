/**
 * Unit tests for cross-strategy agreement checks
 */

import { describe, it, expect } from "vitest";
import { assertAgreement, firstMismatch } from "../src/commands/run.js";
import { CliError, EXIT_DISAGREEMENT, mapErrorToExitCode } from "../src/lib/errors.js";

describe("run agreement", () => {
  describe("firstMismatch", () => {
    it("should return -1 for identical results", () => {
      expect(firstMismatch([2, 3, -5], [2, 3, -5])).toBe(-1);
      expect(firstMismatch([], [])).toBe(-1);
    });

    it("should return the index of the first difference", () => {
      expect(firstMismatch([2, 3, -5], [2, 4, -6])).toBe(1);
    });

    it("should treat a length difference as a mismatch", () => {
      expect(firstMismatch([1, 2], [1, 2, 4])).toBe(2);
      expect(firstMismatch([1, 2, 4], [1, 2])).toBe(2);
    });

    it("should treat -0 and 0 as equal", () => {
      expect(firstMismatch([0], [-0])).toBe(-1);
    });
  });

  describe("assertAgreement", () => {
    it("should return the reference outcome when all agree", () => {
      const naive = { strategy: "naive" as const, results: [2, 3] };
      const reference = assertAgreement([naive, { strategy: "segment", results: [2, 3] }]);
      expect(reference).toBe(naive);
    });

    it("should fail with the disagreement exit code", () => {
      let caught: unknown;
      try {
        assertAgreement([
          { strategy: "naive", results: [2, 3, -5] },
          { strategy: "segment", results: [2, 3, -5] },
          { strategy: "sparse", results: [2, 4, -5] },
        ]);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(CliError);
      expect(caught).toMatchObject({
        message: 'Strategy "sparse" disagrees with "naive" at query 1: 4 != 3',
        exitCode: EXIT_DISAGREEMENT,
      });
      expect(mapErrorToExitCode(caught)).toBe(3);
    });

    it("should reject an empty outcome list", () => {
      expect(() => assertAgreement([])).toThrow("No strategy was run");
    });
  });
});
