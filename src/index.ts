export {
  CATAN_DICE,
  customDie,
  describeDie,
  describeDieSet,
  dieSet,
  standardDice,
  standardDie,
  validateDieSet,
} from "./dice";
export { ConfigurationError, FairnessError } from "./errors";
export type { FitInput, FitOptions } from "./goodnessOfFit";
export { mergeSmallBins, testGoodnessOfFit } from "./goodnessOfFit";
export type { IndependenceOptions } from "./independence";
export { buildContingencyTable, cramersV, testIndependence } from "./independence";
export { parseDieSet } from "./parser";
export { expectedDistribution, PMF } from "./pmf";
export type { DistributionPoint, PlayerDistribution } from "./query";
export { RollLogQuery } from "./query";
export type { FinalScore, ScoreSummaryRow } from "./scores";
export { summarizeScores } from "./scores";
export type {
  PlayerFairness,
  SessionContext,
  SessionOptions,
  SessionPlayer,
  SessionReport,
} from "./session";
export { analyzeSession } from "./session";
export {
  binomialTwoSidedPValue,
  logBinomialPmf,
} from "./stats/binomial";
export type { ChiSquarePValue, PValueMethod } from "./stats/chiSquare";
export {
  approximateMethod,
  chiSquarePValue,
  exactMethod,
  resolvePValueMethod,
} from "./stats/chiSquare";
export { logGamma, regularizedGammaQ } from "./stats/gamma";
export { erfc, normalSurvival, normalTwoSidedPValue } from "./stats/normal";
export type {
  BinLayout,
  OutcomeBinning,
  OutcomeRange,
  OutcomeTally,
} from "./tally";
export {
  binOutcomes,
  EXACT_BINNING,
  lowMidHigh,
  tallyCounts,
  tallyOutcomes,
} from "./tally";
export type {
  ContingencyReport,
  ContingencyTable,
  Die,
  DieSet,
  FairnessBin,
  FairnessGroup,
  FairnessReport,
  OutcomeBin,
  OutcomeDistribution,
  PValueMethodName,
  ReportStatus,
  Roll,
  RollLog,
  SmallExpectedPolicy,
} from "./types";
export { COMPUTATIONAL_EPS, TEST_EPS } from "./types";
