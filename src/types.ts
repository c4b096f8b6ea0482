/** A single die: an explicit face multiset, each face equally likely. */
export interface Die {
  readonly faces: readonly number[];
}

/** One or more dice whose face values are summed on every roll. */
export interface DieSet {
  readonly dice: readonly Die[];
  readonly label?: string;
}

/** One recorded roll. Created by the host application, never mutated here. */
export interface Roll {
  readonly playerId: string;
  readonly sum: number;
  readonly timestamp: Date;
  readonly gameId?: string;
  /** Per-die face values, when the host recorded them. */
  readonly faces?: readonly number[];
}

export type RollLog = readonly Roll[];

/** Simple mapping from outcome (sum) to probability or count. */
export type OutcomeDistribution = Record<number, number>;

/** Computational epsilon for pruning negligible probabilities. */
export const COMPUTATIONAL_EPS = 1e-15;

/** Test tolerance for floating-point precision errors. */
export const TEST_EPS = 1e-9;

export type PValueMethodName = "exact" | "approximate";

export type SmallExpectedPolicy = "merge" | "flag";

export type ReportStatus = "ok" | "insufficient-data" | "not-computable";

export interface FairnessBin {
  outcome: number;
  observed: number;
  expectedProbability: number;
  /** expectedProbability × totalRolls */
  expected: number;
  observedShare: number;
  /** observedShare − expectedProbability */
  delta: number;
  zScore: number;
  normalPValue: number;
  /** Exact two-sided binomial p-value; a per-bin diagnostic, not corrected. */
  binomialPValue: number;
  lowExpected: boolean;
}

/** Bins pooled into a single chi-square category. */
export interface FairnessGroup {
  outcomes: number[];
  observed: number;
  expected: number;
}

export interface FairnessReport {
  status: Exclude<ReportStatus, "not-computable">;
  dieSet: string;
  totalRolls: number;
  /** Observed sums the die set cannot produce, with their counts. */
  unsupported: OutcomeDistribution;
  bins: FairnessBin[];
  groups: FairnessGroup[];
  policy: SmallExpectedPolicy;
  minExpected: number;
  chiSquare: number;
  degreesOfFreedom: number;
  pValue: number;
  method: PValueMethodName;
}

export interface OutcomeBin {
  label: string;
  outcomes: number[];
}

export interface ContingencyTable {
  /** Player ids in order of first appearance. */
  rows: string[];
  columns: OutcomeBin[];
  counts: number[][];
  rowTotals: number[];
  columnTotals: number[];
  grandTotal: number;
  /** Rolls whose sum falls in no column. */
  unbinned: number;
}

export interface ContingencyReport {
  status: ReportStatus;
  table: ContingencyTable;
  /**
   * Expected counts over the rows and columns used by the test: table rows
   * minus `droppedRows`, table columns minus `droppedColumns`.
   */
  expected: number[][];
  /** Players with no binned rolls. */
  droppedRows: string[];
  /** Labels of bins nobody rolled. */
  droppedColumns: string[];
  chiSquare: number;
  degreesOfFreedom: number;
  pValue: number;
  method: PValueMethodName;
  cramersV: number | undefined;
}
