import { describe, it, expect } from "vitest";
import { ValidationError } from "@pyvm/core";
import {
  validateVersionString,
  parseVersion,
  compareVersions,
  isNewerVersion,
  toChannel,
  normalizeInterpreterVersion,
} from "./version.js";

// ---------------------------------------------------------------------------
// validateVersionString
// ---------------------------------------------------------------------------
describe("validateVersionString", () => {
  it("accepts major.minor.patch", () => {
    expect(validateVersionString("3.11.5")).toBe(true);
  });

  it("accepts major.minor", () => {
    expect(validateVersionString("3.11")).toBe(true);
  });

  it("accepts more than three components", () => {
    expect(validateVersionString("3.11.5.1")).toBe(true);
  });

  it("rejects the empty string", () => {
    expect(validateVersionString("")).toBe(false);
  });

  it("rejects a trailing letter", () => {
    expect(validateVersionString("3.11.5a")).toBe(false);
  });

  it("rejects a single component", () => {
    expect(validateVersionString("3")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// parseVersion
// ---------------------------------------------------------------------------
describe("parseVersion", () => {
  it("parses a valid version string", () => {
    expect(parseVersion("3.12.1")).toEqual({ raw: "3.12.1", parts: [3, 12, 1] });
  });

  it("parses multi-digit components", () => {
    expect(parseVersion("10.20.300").parts).toEqual([10, 20, 300]);
  });

  it.each(["", "3", "3.x.1", ".3.11", "3.11.", "3..11", "-3.11"])(
    "throws ValidationError for %j",
    (input) => {
      expect(() => parseVersion(input)).toThrow(ValidationError);
    },
  );

  it("names the offending string", () => {
    expect(() => parseVersion("3.x.1")).toThrow('Invalid version string: "3.x.1"');
  });
});

// ---------------------------------------------------------------------------
// compareVersions
// ---------------------------------------------------------------------------
describe("compareVersions", () => {
  it("returns 0 for equal versions", () => {
    expect(compareVersions("3.12.1", "3.12.1")).toBe(0);
  });

  it("orders by major, then minor, then patch", () => {
    expect(compareVersions("4.0.0", "3.99.99")).toBe(1);
    expect(compareVersions("3.11.0", "3.12.0")).toBe(-1);
    expect(compareVersions("3.12.2", "3.12.1")).toBe(1);
  });

  it("orders components beyond double precision", () => {
    expect(compareVersions("3.99999999999999999999", "3.100000000000000000000")).toBe(-1);
    expect(compareVersions("3.9007199254740993", "3.9007199254740992")).toBe(1);
  });

  it("ignores leading zeros", () => {
    expect(compareVersions("3.011.0", "3.11")).toBe(0);
  });

  it("compares numerically, not lexically", () => {
    expect(compareVersions("3.10.0", "3.9.0")).toBe(1);
    expect(compareVersions("3.9.0", "3.10.0")).toBe(-1);
  });

  it("pads missing trailing components with zero", () => {
    expect(compareVersions("3.11", "3.11.0")).toBe(0);
    expect(compareVersions("3.11.0", "3.11")).toBe(0);
    expect(compareVersions("3.11", "3.11.1")).toBe(-1);
    expect(compareVersions("3.11.0.1", "3.11")).toBe(1);
  });

  it("is antisymmetric", () => {
    const pairs: Array<[string, string]> = [
      ["3.9.0", "3.12.1"],
      ["3.11", "3.11.0"],
      ["2.7.18", "3.0"],
    ];
    for (const [a, b] of pairs) {
      expect(compareVersions(a, b)).toBe(-compareVersions(b, a) || 0);
    }
  });

  it("is transitive", () => {
    const sorted = ["2.7.18", "3.9", "3.9.1", "3.10.0", "3.12.1"];
    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length; j++) {
        expect(compareVersions(sorted[i], sorted[j])).toBe(-1);
      }
    }
  });

  it("throws on malformed input", () => {
    expect(() => compareVersions("3.12.1", "latest")).toThrow(ValidationError);
  });
});

// ---------------------------------------------------------------------------
// isNewerVersion / toChannel / normalizeInterpreterVersion
// ---------------------------------------------------------------------------
describe("isNewerVersion", () => {
  it("returns true when latest is newer", () => {
    expect(isNewerVersion("3.9.0", "3.12.1")).toBe(true);
  });

  it("returns false when versions are equal", () => {
    expect(isNewerVersion("3.12.1", "3.12.1")).toBe(false);
  });

  it("returns false when current is newer", () => {
    expect(isNewerVersion("3.13.0", "3.12.1")).toBe(false);
  });
});

describe("toChannel", () => {
  it("keeps major.minor", () => {
    expect(toChannel("3.12.1")).toBe("3.12");
    expect(toChannel("3.9")).toBe("3.9");
    expect(toChannel("3.99999999999999999999.1")).toBe("3.99999999999999999999");
  });

  it("throws on malformed input", () => {
    expect(() => toChannel("3")).toThrow(ValidationError);
  });
});

describe("normalizeInterpreterVersion", () => {
  it("drops pre-release suffixes", () => {
    expect(normalizeInterpreterVersion("3.13.0rc1")).toBe("3.13.0");
  });

  it("trims whitespace", () => {
    expect(normalizeInterpreterVersion(" 3.12.1\n")).toBe("3.12.1");
  });

  it("returns null without a dotted number", () => {
    expect(normalizeInterpreterVersion("Python")).toBeNull();
  });
});
