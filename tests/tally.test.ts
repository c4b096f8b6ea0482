import { describe, expect, it } from "vitest";
import {
  binOutcomes,
  ConfigurationError,
  lowMidHigh,
  tallyCounts,
  tallyOutcomes,
} from "../src/index";

describe("tallyOutcomes", () => {
  it("fills every supported outcome and keeps the rest apart", () => {
    const tally = tallyOutcomes([{ sum: 3 }, { sum: 1 }, { sum: 3 }, { sum: 9 }], [1, 2, 3]);
    expect([...tally.counts.entries()]).toEqual([
      [1, 1],
      [2, 0],
      [3, 2],
    ]);
    expect([...tally.unsupported.entries()]).toEqual([[9, 1]]);
    expect(tally.total).toBe(3);
  });

  it("without a support, tallies what was observed in ascending order", () => {
    const tally = tallyOutcomes([{ sum: 8 }, { sum: 4 }, { sum: 8 }]);
    expect([...tally.counts.entries()]).toEqual([
      [4, 1],
      [8, 2],
    ]);
    expect(tally.unsupported.size).toBe(0);
  });
});

describe("tallyCounts", () => {
  it("rejects negative or fractional counts", () => {
    expect(() => tallyCounts({ 7: -1 })).toThrow(ConfigurationError);
    expect(() => tallyCounts({ 7: 1.5 })).toThrow(
      "Observed count for 7 must be a non-negative integer (got 1.5)"
    );
  });
});

describe("lowMidHigh", () => {
  it("splits 2d6 into 2-5, 6-8 and 9-12", () => {
    expect(lowMidHigh([2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12])).toEqual({
      kind: "ranges",
      ranges: [
        { label: "low", min: 2, max: 5 },
        { label: "mid", min: 6, max: 8 },
        { label: "high", min: 9, max: 12 },
      ],
    });
  });

  it("splits a single d6 evenly", () => {
    expect(lowMidHigh([6, 5, 4, 3, 2, 1])).toEqual({
      kind: "ranges",
      ranges: [
        { label: "low", min: 1, max: 2 },
        { label: "mid", min: 3, max: 4 },
        { label: "high", min: 5, max: 6 },
      ],
    });
  });

  it("drops the middle when only two outcomes exist", () => {
    expect(lowMidHigh([0, 1])).toEqual({
      kind: "ranges",
      ranges: [
        { label: "low", min: 0, max: 0 },
        { label: "high", min: 1, max: 1 },
      ],
    });
  });
});

describe("binOutcomes", () => {
  it("exact binning has one column per outcome", () => {
    const layout = binOutcomes({ kind: "exact" }, [4, 2, 3, 2]);
    expect(layout.bins.map((b) => b.label)).toEqual(["2", "3", "4"]);
    expect(layout.indexOf(3)).toBe(1);
    expect(layout.indexOf(5)).toBeUndefined();
  });

  it("sorts ranges and rejects inverted ones", () => {
    const layout = binOutcomes(
      {
        kind: "ranges",
        ranges: [
          { label: "high", min: 5, max: 6 },
          { label: "low", min: 1, max: 4 },
        ],
      },
      [1, 2, 3, 4, 5, 6]
    );
    expect(layout.bins.map((b) => b.label)).toEqual(["low", "high"]);
    expect(layout.indexOf(5)).toBe(1);
    expect(() =>
      binOutcomes({ kind: "ranges", ranges: [{ label: "x", min: 4, max: 1 }] }, [1])
    ).toThrow('Bin "x" has min 4 above max 1');
  });
});
