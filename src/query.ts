import type { FitOptions } from "./goodnessOfFit";
import { testGoodnessOfFit } from "./goodnessOfFit";
import type { IndependenceOptions } from "./independence";
import { testIndependence } from "./independence";
import { expectedDistribution } from "./pmf";
import { tallyOutcomes } from "./tally";
import type {
  ContingencyReport,
  DieSet,
  FairnessReport,
  Roll,
  RollLog,
} from "./types";

export interface DistributionPoint {
  x: number;
  observed: number;
  expected: number;
  expectedProbability: number;
}

export interface PlayerDistribution {
  playerId: string;
  points: DistributionPoint[];
}

/**
 * Query interface over a snapshot of recorded rolls.
 *
 * Narrows the log (per game, per player, lifetime) and runs the fairness
 * tests against a die set. The log is copied and frozen on construction.
 */
export class RollLogQuery {
  public readonly rolls: RollLog;

  constructor(rolls: readonly Roll[]) {
    this.rolls = Object.freeze([...rolls]);
  }

  get size(): number {
    return this.rolls.length;
  }

  /** Rolls from a single game. */
  forGame(gameId: string): RollLogQuery {
    return new RollLogQuery(this.rolls.filter((r) => r.gameId === gameId));
  }

  /** Rolls made by a single player. */
  forPlayer(playerId: string): RollLogQuery {
    return new RollLogQuery(this.rolls.filter((r) => r.playerId === playerId));
  }

  /** Player ids in order of first appearance. */
  players(): string[] {
    return [...new Set(this.rolls.map((r) => r.playerId))];
  }

  /** Roll sums in log order. */
  totals(): number[] {
    return this.rolls.map((r) => r.sum);
  }

  /**
   * Observed and expected counts per achievable sum, for charting.
   *
   * Example: `query.distribution(CATAN_DICE)[5]` → `{ x: 7, observed: 9, expected: 6, expectedProbability: 0.1667 }`
   */
  distribution(set: DieSet): DistributionPoint[] {
    const pmf = expectedDistribution(set);
    const tally = tallyOutcomes(this.rolls, pmf.support());
    return pmf.support().map((x) => ({
      x,
      observed: tally.counts.get(x) ?? 0,
      expected: pmf.probability(x) * tally.total,
      expectedProbability: pmf.probability(x),
    }));
  }

  perPlayerDistribution(set: DieSet): PlayerDistribution[] {
    return this.players().map((playerId) => ({
      playerId,
      points: this.forPlayer(playerId).distribution(set),
    }));
  }

  fairness(set: DieSet, options?: FitOptions): FairnessReport {
    return testGoodnessOfFit(this.rolls, set, options);
  }

  independence(set: DieSet, options?: IndependenceOptions): ContingencyReport {
    return testIndependence(this.rolls, set, options);
  }
}
