import type { Roll } from "../src/index";

/** Weight of each 2d6 sum, out of 36. */
export const TWO_D6_WEIGHTS: Record<number, number> = {
  2: 1,
  3: 2,
  4: 3,
  5: 4,
  6: 5,
  7: 6,
  8: 5,
  9: 4,
  10: 3,
  11: 2,
  12: 1,
};

/** One roll per unit of count, in ascending sum order. */
export function rollsFrom(
  counts: Record<number, number>,
  playerId = "p1",
  gameId = "g1"
): Roll[] {
  const rolls: Roll[] = [];
  for (const [sum, count] of Object.entries(counts)) {
    for (let i = 0; i < count; i++) {
      rolls.push({
        playerId,
        gameId,
        sum: Number(sum),
        timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, rolls.length)),
      });
    }
  }
  return rolls;
}

export function scaled(
  counts: Record<number, number>,
  factor: number
): Record<number, number> {
  const out: Record<number, number> = {};
  for (const [k, v] of Object.entries(counts)) out[Number(k)] = v * factor;
  return out;
}
