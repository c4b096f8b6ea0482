import { customDie, standardDie, validateDieSet } from "./dice";
import { ConfigurationError } from "./errors";
import type { Die, DieSet } from "./types";

/**
 * Parse die-set notation into a DieSet.
 *
 * Terms are joined by `+`:
 * - `2d6`, `d8`: standard dice
 * - `{1,1,2,3,4,5}`, `2{0,1}`: dice with an explicit face list
 *
 * The expression is case-insensitive and ignores spaces.
 */
export function parseDieSet(expression: string): DieSet {
  const cleaned = expression.replace(/\s/g, "").toLowerCase();
  const chars = [...cleaned];

  let dice: Die[];
  try {
    dice = parseExpression(chars);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Cannot parse die set [${expression}]: ${reason}`
    );
  }

  if (chars.length > 0) {
    throw new ConfigurationError(
      `Unexpected token: '${chars[0]}' from expression: '${expression}'`
    );
  }

  const set: DieSet = { dice, label: cleaned };
  validateDieSet(set);
  return set;
}

function parseExpression(s: string[]): Die[] {
  const dice = parseTerm(s);
  while (s[0] === "+") {
    s.shift();
    dice.push(...parseTerm(s));
  }
  return dice;
}

const MAX_DIE_COUNT = 1000;

function parseTerm(s: string[]): Die[] {
  const count = isDigit(s[0]) ? parseNumber(s) : 1;
  if (count < 1) throw new Error(`Die count must be at least 1, found ${count}`);
  if (count > MAX_DIE_COUNT) {
    throw new Error(`Die count must be at most ${MAX_DIE_COUNT}, found ${count}`);
  }

  let die: Die;
  if (s[0] === "d") {
    s.shift();
    die = standardDie(parseNumber(s));
  } else if (s[0] === "{") {
    die = customDie(parseFaceList(s));
  } else {
    throw new Error(`Expected 'd' or '{', found '${s[0] ?? "end of input"}'`);
  }
  return Array.from({ length: count }, () => die);
}

function parseFaceList(s: string[]): number[] {
  assertToken(s, "{");
  const faces = [parseSigned(s)];
  while (s[0] === ",") {
    s.shift();
    faces.push(parseSigned(s));
  }
  assertToken(s, "}");
  return faces;
}

function assertToken(s: string[], expected: string): void {
  for (const ch of expected) {
    const found = s.shift();
    if (found !== ch) {
      throw new Error(`Expected character '${ch}', found '${found ?? "end of input"}'`);
    }
  }
}

function parseSigned(s: string[]): number {
  if (s[0] === "-") {
    s.shift();
    return -parseNumber(s);
  }
  return parseNumber(s);
}

function parseNumber(s: string[]): number {
  let ret = "";
  while (s.length > 0 && isDigit(s[0])) {
    ret += s.shift() ?? "";
  }
  if (ret.length === 0) {
    throw new Error(`Expected number, found: '${s[0] ?? "end of input"}'`);
  }
  return parseInt(ret, 10);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}
