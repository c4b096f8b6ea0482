import { logger } from "./common/logger";
import { env } from "./config/env";
import { describeDieSet } from "./dice";
import { expectedDistribution } from "./pmf";
import { binomialTwoSidedPValue } from "./stats/binomial";
import type { PValueMethod } from "./stats/chiSquare";
import { chiSquarePValue, resolvePValueMethod } from "./stats/chiSquare";
import { normalTwoSidedPValue } from "./stats/normal";
import { tallyCounts, tallyOutcomes } from "./tally";
import type {
  DieSet,
  FairnessBin,
  FairnessGroup,
  FairnessReport,
  OutcomeDistribution,
  PValueMethodName,
  RollLog,
  SmallExpectedPolicy,
} from "./types";

export interface FitOptions {
  /** Bins with a smaller expected count are merged or flagged. */
  minExpected?: number;
  smallExpectedPolicy?: SmallExpectedPolicy;
  pValueMethod?: PValueMethodName | PValueMethod;
}

/** Rolls, or observed counts keyed by sum. */
export type FitInput = RollLog | OutcomeDistribution | ReadonlyMap<number, number>;

/**
 * Pools adjacent bins, in ascending order, until each pool's expected count
 * reaches `minExpected`. A trailing pool still short of it joins the previous one.
 */
export function mergeSmallBins(
  bins: readonly Pick<FairnessBin, "outcome" | "observed" | "expected">[],
  minExpected: number
): FairnessGroup[] {
  const groups: FairnessGroup[] = [];
  let current: FairnessGroup | undefined;

  for (const bin of bins) {
    if (!(bin.expected > 0)) continue;
    current = current ?? { outcomes: [], observed: 0, expected: 0 };
    current.outcomes.push(bin.outcome);
    current.observed += bin.observed;
    current.expected += bin.expected;
    if (current.expected >= minExpected) {
      groups.push(current);
      current = undefined;
    }
  }

  if (current) {
    const last = groups[groups.length - 1];
    if (last) {
      last.outcomes.push(...current.outcomes);
      last.observed += current.observed;
      last.expected += current.expected;
    } else {
      groups.push(current);
    }
  }
  return groups;
}

function singleBinGroups(
  bins: readonly Pick<FairnessBin, "outcome" | "observed" | "expected">[]
): FairnessGroup[] {
  return bins
    .filter((bin) => bin.expected > 0)
    .map((bin) => ({
      outcomes: [bin.outcome],
      observed: bin.observed,
      expected: bin.expected,
    }));
}

function isRollLog(input: FitInput): input is RollLog {
  return Array.isArray(input);
}

/**
 * Chi-square goodness-of-fit of observed sums against the die set's
 * theoretical distribution, plus per-outcome diagnostics.
 *
 * Sums the die set cannot produce are reported under `unsupported` and left
 * out of `totalRolls`. With no usable rolls, or fewer than two categories
 * after pooling, the report is marked "insufficient-data".
 */
export function testGoodnessOfFit(
  input: FitInput,
  set: DieSet,
  options: FitOptions = {}
): FairnessReport {
  const minExpected = options.minExpected ?? env.MIN_EXPECTED;
  const policy = options.smallExpectedPolicy ?? env.SMALL_EXPECTED_POLICY;
  const method = resolvePValueMethod(options.pValueMethod ?? env.PVALUE_METHOD);

  const pmf = expectedDistribution(set);
  const support = pmf.support();
  const tally = isRollLog(input)
    ? tallyOutcomes(input, support)
    : tallyCounts(input, support);
  const n = tally.total;

  const unsupported: OutcomeDistribution = {};
  for (const [outcome, count] of tally.unsupported) unsupported[outcome] = count;
  if (tally.unsupported.size > 0) {
    logger.debug({ unsupported }, "excluding sums the die set cannot produce");
  }

  const bins: FairnessBin[] = support.map((outcome) => {
    const observed = tally.counts.get(outcome) ?? 0;
    const probability = pmf.probability(outcome);
    const expected = probability * n;
    const sigma = Math.sqrt(n * probability * (1 - probability));
    const share = n > 0 ? observed / n : NaN;
    const zScore = n === 0 ? NaN : sigma > 0 ? (observed - expected) / sigma : 0;
    return {
      outcome,
      observed,
      expectedProbability: probability,
      expected,
      observedShare: share,
      delta: share - probability,
      zScore,
      normalPValue: normalTwoSidedPValue(zScore),
      binomialPValue: binomialTwoSidedPValue(observed, n, probability),
      lowExpected: expected < minExpected,
    };
  });

  const base = {
    dieSet: set.label ?? describeDieSet(set),
    totalRolls: n,
    unsupported,
    bins,
    policy,
    minExpected,
  };

  let groups: FairnessGroup[] = [];
  if (n > 0) {
    groups =
      policy === "merge"
        ? mergeSmallBins(bins, minExpected)
        : singleBinGroups(bins);
  }

  if (groups.length < 2) {
    return {
      ...base,
      status: "insufficient-data",
      groups,
      chiSquare: NaN,
      degreesOfFreedom: 0,
      pValue: NaN,
      method: method.name,
    };
  }

  if (groups.length < bins.length) {
    logger.debug(
      { dieSet: base.dieSet, bins: bins.length, groups: groups.length, minExpected },
      "pooled low-expectation bins"
    );
  }

  let chiSquare = 0;
  for (const { observed, expected } of groups) {
    chiSquare += (observed - expected) ** 2 / expected;
  }
  const degreesOfFreedom = groups.length - 1;
  const { pValue, method: used } = chiSquarePValue(chiSquare, degreesOfFreedom, method);

  return {
    ...base,
    status: "ok",
    groups,
    chiSquare,
    degreesOfFreedom,
    pValue,
    method: used,
  };
}
