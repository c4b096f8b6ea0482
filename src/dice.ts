import { ConfigurationError } from "./errors";
import type { Die, DieSet } from "./types";

/** A die with faces 1..sides. */
export function standardDie(sides: number): Die {
  if (!Number.isSafeInteger(sides) || sides < 2) {
    throw new ConfigurationError(
      `A standard die needs an integer side count of at least 2 (got ${sides})`
    );
  }
  return { faces: Array.from({ length: sides }, (_, i) => i + 1) };
}

/**
 * A die with an explicit face list. Repeated labels are kept, so
 * `customDie([1, 1, 2, 3, 4, 5])` rolls a 1 twice as often as a 2.
 */
export function customDie(faces: readonly number[]): Die {
  const die = { faces: [...faces] };
  validateDie(die, 0);
  return die;
}

export function dieSet(...dice: Die[]): DieSet {
  const set = { dice };
  validateDieSet(set);
  return set;
}

export function standardDice(count: number, sides: number): DieSet {
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new ConfigurationError(
      `Die count must be a positive integer (got ${count})`
    );
  }
  const die = standardDie(sides);
  return { dice: Array.from({ length: count }, () => die), label: `${count}d${sides}` };
}

/** Two six-sided dice. */
export const CATAN_DICE: DieSet = standardDice(2, 6);

function validateDie(die: Die, index: number): void {
  if (die.faces.length < 2) {
    throw new ConfigurationError(
      `Die ${index + 1} has ${die.faces.length} face(s); at least 2 are required`
    );
  }
  for (const face of die.faces) {
    if (!Number.isSafeInteger(face)) {
      throw new ConfigurationError(
        `Die ${index + 1} has a non-integer face: ${face}`
      );
    }
  }
}

/** Throws ConfigurationError unless the set has at least one die and every die at least 2 faces. */
export function validateDieSet(set: DieSet): void {
  if (set.dice.length === 0) {
    throw new ConfigurationError("A die set needs at least one die");
  }
  set.dice.forEach(validateDie);
}

function isStandard(die: Die): boolean {
  return die.faces.every((face, i) => face === i + 1);
}

/** Canonical identifier: `d6` for a standard die, `{1,1,2,3,4,5}` otherwise (faces sorted). */
export function describeDie(die: Die): string {
  if (isStandard(die)) return `d${die.faces.length}`;
  const sorted = [...die.faces].sort((a, b) => a - b);
  return `{${sorted.join(",")}}`;
}

/**
 * Canonical identifier for a whole set, independent of die order.
 * Example: `describeDieSet(dieSet(standardDie(8), standardDie(6)))` → `"d6+d8"`.
 */
export function describeDieSet(set: DieSet): string {
  const counts = new Map<string, number>();
  for (const die of set.dice) {
    const id = describeDie(die);
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return [...counts.keys()]
    .sort()
    .map((id) => {
      const n = counts.get(id) ?? 0;
      return n > 1 ? `${n}${id}` : id;
    })
    .join("+");
}
