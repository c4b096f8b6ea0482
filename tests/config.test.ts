import { describe, expect, it } from "vitest";
import { parseEngineDefaults } from "../src/config/env";
import { ConfigurationError } from "../src/index";

describe("parseEngineDefaults", () => {
  it("falls back to defaults", () => {
    expect(parseEngineDefaults({})).toEqual({
      NODE_ENV: "development",
      LOG_LEVEL: "info",
      MIN_EXPECTED: 5,
      SMALL_EXPECTED_POLICY: "merge",
      PVALUE_METHOD: "exact",
    });
  });

  it("silences logging under test", () => {
    expect(parseEngineDefaults({ NODE_ENV: "test" }).LOG_LEVEL).toBe("silent");
  });

  it("reads overrides", () => {
    const defaults = parseEngineDefaults({
      LOG_LEVEL: "debug",
      FAIRNESS_MIN_EXPECTED: "10",
      FAIRNESS_SMALL_EXPECTED_POLICY: "flag",
      FAIRNESS_PVALUE_METHOD: "approximate",
    });
    expect(defaults.LOG_LEVEL).toBe("debug");
    expect(defaults.MIN_EXPECTED).toBe(10);
    expect(defaults.SMALL_EXPECTED_POLICY).toBe("flag");
    expect(defaults.PVALUE_METHOD).toBe("approximate");
  });

  it("rejects bad values", () => {
    expect(() => parseEngineDefaults({ FAIRNESS_MIN_EXPECTED: "abc" })).toThrow(
      ConfigurationError
    );
    expect(() =>
      parseEngineDefaults({ FAIRNESS_SMALL_EXPECTED_POLICY: "pool" })
    ).toThrow('FAIRNESS_SMALL_EXPECTED_POLICY must be one of merge, flag (got "pool")');
  });
});
