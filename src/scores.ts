export interface FinalScore {
  gameId: string;
  playerId: string;
  score: number;
}

export interface ScoreSummaryRow {
  playerId: string;
  name: string;
  games: number;
  wins: number;
  winRate: number;
  avgScore: number;
  bestScore: number;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Lifetime leaderboard. A player wins a game when their score equals the
 * game's top score, so tied leaders all get the win.
 */
export function summarizeScores(
  scores: readonly FinalScore[],
  names: ReadonlyMap<string, string> = new Map()
): ScoreSummaryRow[] {
  const topScore = new Map<string, number>();
  for (const { gameId, score } of scores) {
    topScore.set(gameId, Math.max(topScore.get(gameId) ?? -Infinity, score));
  }

  const byPlayer = new Map<
    string,
    { games: Set<string>; wins: number; total: number; count: number; best: number }
  >();
  for (const { gameId, playerId, score } of scores) {
    const entry = byPlayer.get(playerId) ?? {
      games: new Set<string>(),
      wins: 0,
      total: 0,
      count: 0,
      best: -Infinity,
    };
    entry.games.add(gameId);
    if (score === topScore.get(gameId)) entry.wins += 1;
    entry.total += score;
    entry.count += 1;
    entry.best = Math.max(entry.best, score);
    byPlayer.set(playerId, entry);
  }

  return [...byPlayer.entries()]
    .map(([playerId, e]) => ({
      playerId,
      name: names.get(playerId) ?? playerId,
      games: e.games.size,
      wins: e.wins,
      winRate: round(e.wins / e.games.size, 3),
      avgScore: round(e.total / e.count, 2),
      bestScore: e.best,
    }))
    .sort((a, b) => b.wins - a.wins || b.avgScore - a.avgScore);
}
