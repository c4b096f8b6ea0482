import { describeDie, validateDieSet } from "./dice";
import type { Die, DieSet, OutcomeDistribution } from "./types";
import { COMPUTATIONAL_EPS } from "./types";

/**
 * Probability Mass Function over integer outcomes (dice sums).
 *
 * Masses are kept as integer weights over an integer total while that total
 * stays a safe integer, so `probability(x)` is an exact ratio. Larger
 * convolutions switch to floating-point masses over a total of 1; every
 * achievable sum keeps its (possibly tiny) mass.
 *
 * Core operations:
 * - fromDie(): uniform distribution over a die's face multiset
 * - convolve(): distribution of the sum of two independent PMFs
 * - convolveMany(): order-independent fold of convolve()
 */
export class PMF {
  // Cached computed values
  private _support?: number[];
  private _mass?: number;
  private _mean?: number;
  private _variance?: number;

  private constructor(
    private readonly weights: ReadonlyMap<number, number>,
    private readonly total: number,
    public readonly exact: boolean,
    public readonly identifier: string
  ) {}

  /** A die's face multiset; a repeated label gets proportionally more weight. */
  static fromDie(die: Die): PMF {
    const weights = new Map<number, number>();
    for (const face of die.faces) {
      weights.set(face, (weights.get(face) ?? 0) + 1);
    }
    return new PMF(weights, die.faces.length, true, describeDie(die));
  }

  /** Builds a PMF from explicit (possibly unnormalized) masses. */
  static fromRecord(record: OutcomeDistribution, identifier = "custom"): PMF {
    const weights = new Map<number, number>();
    let total = 0;
    for (const [key, mass] of Object.entries(record)) {
      if (mass <= 0) continue;
      weights.set(Number(key), mass);
      total += mass;
    }
    const exact =
      Number.isSafeInteger(total) &&
      [...weights.values()].every((w) => Number.isSafeInteger(w));
    return new PMF(weights, total, exact, identifier);
  }

  //  Makes PMF iterable over [outcome, probability] pairs in ascending order.
  *[Symbol.iterator](): IterableIterator<[number, number]> {
    for (const outcome of this.support()) {
      yield [outcome, this.probability(outcome)];
    }
  }

  /**
   * Distribution of the sum of this and `other`.
   * Operands are put in canonical order first, so `a.convolve(b)` and
   * `b.convolve(a)` take the same arithmetic path and agree bit for bit.
   */
  convolve(other: PMF): PMF {
    const [A, B] =
      this.identifier <= other.identifier ? [this, other] : [other, this];
    const identifier = `${A.identifier}+${B.identifier}`;
    const total = A.total * B.total;

    if (A.exact && B.exact && Number.isSafeInteger(total)) {
      const weights = new Map<number, number>();
      for (const [aVal, aW] of A.weights) {
        for (const [bVal, bW] of B.weights) {
          const sum = aVal + bVal;
          weights.set(sum, (weights.get(sum) ?? 0) + aW * bW);
        }
      }
      return new PMF(weights, total, true, identifier);
    }

    const masses = new Map<number, number>();
    for (const [aVal, aP] of A) {
      for (const [bVal, bP] of B) {
        const sum = aVal + bVal;
        masses.set(sum, (masses.get(sum) ?? 0) + aP * bP);
      }
    }
    return new PMF(masses, 1, false, identifier).normalize();
  }

  static convolveMany(pmfList: readonly PMF[]): PMF {
    if (pmfList.length === 0) {
      return new PMF(new Map([[0, 1]]), 1, true, "zero");
    }
    // Sorting by identifier makes the fold independent of input order.
    const ordered = [...pmfList].sort((a, b) =>
      a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0
    );
    return ordered.slice(1).reduce((acc, pmf) => acc.convolve(pmf), ordered[0]);
  }

  normalize(): PMF {
    const mass = this.mass();
    if (this.exact || mass === 0 || Math.abs(mass - 1) <= COMPUTATIONAL_EPS) {
      return this;
    }
    const masses = new Map<number, number>();
    for (const [outcome, w] of this.weights) masses.set(outcome, w / mass);
    return new PMF(masses, 1, false, this.identifier);
  }

  probability(outcome: number): number {
    const w = this.weights.get(outcome);
    return w === undefined || this.total === 0 ? 0 : w / this.total;
  }

  mass(): number {
    if (this._mass === undefined) {
      let totalProbabilityMass = 0;
      for (const outcome of this.weights.keys()) {
        totalProbabilityMass += this.probability(outcome);
      }
      this._mass = totalProbabilityMass;
    }
    return this._mass;
  }

  support(): number[] {
    if (this._support === undefined) {
      this._support = [...this.weights.keys()].sort((a, b) => a - b);
    }
    return this._support;
  }

  min(): number {
    const support = this.support();
    return support.length > 0 ? support[0] : 0;
  }

  max(): number {
    const support = this.support();
    return support.length > 0 ? support[support.length - 1] : 0;
  }

  mean(): number {
    if (this._mean === undefined) {
      let totalSum = 0;
      for (const [outcome, p] of this) totalSum += outcome * p;
      this._mean = totalSum;
    }
    return this._mean;
  }

  variance(): number {
    if (this._variance === undefined) {
      const meanValue = this.mean();
      let varianceSum = 0;
      for (const [outcome, p] of this) {
        const deviationFromMean = outcome - meanValue;
        varianceSum += deviationFromMean * deviationFromMean * p;
      }
      this._variance = varianceSum;
    }
    return this._variance;
  }

  stddev(): number {
    return Math.sqrt(this.variance());
  }

  toRecord(): OutcomeDistribution {
    const out: OutcomeDistribution = {};
    for (const [outcome, p] of this) out[outcome] = p;
    return out;
  }
}

/**
 * Theoretical distribution of the sum of every die in `set`.
 * Throws ConfigurationError for an invalid set before convolving anything.
 */
export function expectedDistribution(set: DieSet): PMF {
  validateDieSet(set);
  return PMF.convolveMany(set.dice.map(PMF.fromDie));
}
