import { ConfigurationError } from "./errors";
import type { OutcomeBin, OutcomeDistribution, Roll } from "./types";

export interface OutcomeRange {
  label: string;
  min: number;
  max: number;
}

/** How observed sums are grouped into columns for the independence test. */
export type OutcomeBinning =
  | { kind: "exact" }
  | { kind: "ranges"; ranges: readonly OutcomeRange[] };

export const EXACT_BINNING: OutcomeBinning = { kind: "exact" };

export interface OutcomeTally {
  /** Count per outcome in `support` (zero when unseen), ascending. */
  counts: Map<number, number>;
  /** Counts of observed sums outside `support`. */
  unsupported: Map<number, number>;
  total: number;
}

/**
 * Tally roll sums. Every outcome in `support` appears in `counts`; with no
 * support given, every observed sum does.
 */
export function tallyOutcomes(
  rolls: readonly Pick<Roll, "sum">[],
  support?: readonly number[]
): OutcomeTally {
  const observed = new Map<number, number>();
  for (const { sum } of rolls) {
    observed.set(sum, (observed.get(sum) ?? 0) + 1);
  }
  return tallyCounts(observed, support);
}

function isCountMap(
  observed: ReadonlyMap<number, number> | OutcomeDistribution
): observed is ReadonlyMap<number, number> {
  return observed instanceof Map;
}

/** Same as tallyOutcomes, from precomputed counts. */
export function tallyCounts(
  observed: ReadonlyMap<number, number> | OutcomeDistribution,
  support?: readonly number[]
): OutcomeTally {
  const entries: [number, number][] = isCountMap(observed)
    ? [...observed.entries()]
    : Object.entries(observed).map(([k, v]): [number, number] => [Number(k), v]);

  const keys = support ?? entries.map(([k]) => k);
  const counts = new Map<number, number>();
  for (const outcome of [...keys].sort((a, b) => a - b)) counts.set(outcome, 0);

  const unsupported = new Map<number, number>();
  let total = 0;
  for (const [outcome, count] of entries) {
    if (!Number.isInteger(count) || count < 0) {
      throw new ConfigurationError(
        `Observed count for ${outcome} must be a non-negative integer (got ${count})`
      );
    }
    const current = counts.get(outcome);
    if (current === undefined) {
      unsupported.set(outcome, (unsupported.get(outcome) ?? 0) + count);
    } else {
      counts.set(outcome, current + count);
      total += count;
    }
  }
  return { counts, unsupported, total };
}

/**
 * Three contiguous ranges over `support`: the outer two hold about a third
 * of the outcomes each. For 2d6 that is 2-5, 6-8 and 9-12.
 */
export function lowMidHigh(support: readonly number[]): OutcomeBinning {
  const sorted = [...support].sort((a, b) => a - b);
  const side = Math.round(sorted.length / 3);
  const middle = sorted.length - 2 * side;

  const ranges: OutcomeRange[] = [];
  const push = (label: string, from: number, to: number) => {
    if (to > from) ranges.push({ label, min: sorted[from], max: sorted[to - 1] });
  };
  push("low", 0, side);
  if (middle > 0) push("mid", side, side + middle);
  push("high", side + Math.max(middle, 0), sorted.length);
  return { kind: "ranges", ranges };
}

export interface BinLayout {
  bins: OutcomeBin[];
  /** Column index for a sum, or undefined when no bin holds it. */
  indexOf(sum: number): number | undefined;
}

/** Ordered bins for `outcomes`, ascending by their lowest outcome. */
export function binOutcomes(
  binning: OutcomeBinning,
  outcomes: readonly number[]
): BinLayout {
  const sorted = [...new Set(outcomes)].sort((a, b) => a - b);

  if (binning.kind === "exact") {
    const index = new Map(sorted.map((outcome, i): [number, number] => [outcome, i]));
    return {
      bins: sorted.map((outcome) => ({ label: String(outcome), outcomes: [outcome] })),
      indexOf: (sum) => index.get(sum),
    };
  }

  const ranges = [...binning.ranges].sort((a, b) => a.min - b.min);
  for (let i = 0; i < ranges.length; i++) {
    const range = ranges[i];
    if (range.min > range.max) {
      throw new ConfigurationError(
        `Bin "${range.label}" has min ${range.min} above max ${range.max}`
      );
    }
    if (i > 0 && range.min <= ranges[i - 1].max) {
      throw new ConfigurationError(
        `Bins "${ranges[i - 1].label}" and "${range.label}" overlap`
      );
    }
  }

  const bins = ranges.map((range) => ({
    label: range.label,
    outcomes: sorted.filter((o) => o >= range.min && o <= range.max),
  }));
  return {
    bins,
    indexOf: (sum) => {
      const i = ranges.findIndex((r) => sum >= r.min && sum <= r.max);
      return i === -1 ? undefined : i;
    },
  };
}
