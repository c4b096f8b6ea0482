import { validateDieSet } from "./dice";
import type { FitOptions } from "./goodnessOfFit";
import type { IndependenceOptions } from "./independence";
import { RollLogQuery } from "./query";
import type {
  ContingencyReport,
  DieSet,
  FairnessReport,
  RollLog,
} from "./types";

export interface SessionPlayer {
  id: string;
  name: string;
}

/**
 * Everything the engine needs to know about the session being analyzed,
 * passed in explicitly by the host application.
 */
export interface SessionContext {
  /** Restricts the analysis to one game; omit for lifetime history. */
  gameId?: string;
  dieSet: DieSet;
  players: readonly SessionPlayer[];
  /** Stamped on the report; the current time when omitted. */
  analyzedAt?: Date;
}

export interface PlayerFairness {
  playerId: string;
  name: string;
  report: FairnessReport;
}

export interface SessionReport {
  gameId: string | undefined;
  /** Rolls in the analyzed slice of the log. */
  rolls: number;
  fairness: FairnessReport;
  perPlayer: PlayerFairness[];
  independence: ContingencyReport;
  analyzedAt: Date;
}

export type SessionOptions = FitOptions & Pick<IndependenceOptions, "binning">;

/**
 * Runs every fairness test for a session: the whole table, each player on
 * their own, and players against outcomes.
 */
export function analyzeSession(
  context: SessionContext,
  log: RollLog,
  options: SessionOptions = {}
): SessionReport {
  validateDieSet(context.dieSet);

  const all = new RollLogQuery(log);
  const query = context.gameId === undefined ? all : all.forGame(context.gameId);
  const names = new Map(context.players.map((p): [string, string] => [p.id, p.name]));

  // Context players first (in their given order), then anyone else who rolled.
  const playerIds = [
    ...new Set([...context.players.map((p) => p.id), ...query.players()]),
  ];

  const { binning, ...fitOptions } = options;

  return {
    gameId: context.gameId,
    rolls: query.size,
    fairness: query.fairness(context.dieSet, fitOptions),
    perPlayer: playerIds.map((playerId) => ({
      playerId,
      name: names.get(playerId) ?? playerId,
      report: query.forPlayer(playerId).fairness(context.dieSet, fitOptions),
    })),
    independence: query.independence(context.dieSet, {
      binning,
      pValueMethod: fitOptions.pValueMethod,
    }),
    analyzedAt: context.analyzedAt ?? new Date(),
  };
}
