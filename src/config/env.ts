import { ConfigurationError } from "../errors";
import type { PValueMethodName, SmallExpectedPolicy } from "../types";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface EngineDefaults {
  NODE_ENV: string;
  LOG_LEVEL: LogLevel;
  /** Bins whose expected count is below this are merged or flagged. */
  MIN_EXPECTED: number;
  SMALL_EXPECTED_POLICY: SmallExpectedPolicy;
  PVALUE_METHOD: PValueMethodName;
}

type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function oneOf<T extends string>(
  name: string,
  raw: string,
  allowed: readonly T[]
): T {
  const found = allowed.find((value) => value === raw);
  if (found === undefined) {
    throw new ConfigurationError(
      `${name} must be one of ${allowed.join(", ")} (got "${raw}")`
    );
  }
  return found;
}

function resolveMinExpected(raw: string | undefined): number {
  if (raw === undefined || raw === "") return 5;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      `FAIRNESS_MIN_EXPECTED must be a non-negative number (got "${raw}")`
    );
  }
  return value;
}

export function parseEngineDefaults(source: EnvSource): EngineDefaults {
  const nodeEnv = source.NODE_ENV ?? "development";
  return {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: oneOf(
      "LOG_LEVEL",
      source.LOG_LEVEL ?? (nodeEnv === "test" ? "silent" : "info"),
      LOG_LEVELS
    ),
    MIN_EXPECTED: resolveMinExpected(source.FAIRNESS_MIN_EXPECTED),
    SMALL_EXPECTED_POLICY: oneOf(
      "FAIRNESS_SMALL_EXPECTED_POLICY",
      source.FAIRNESS_SMALL_EXPECTED_POLICY ?? "merge",
      ["merge", "flag"]
    ),
    PVALUE_METHOD: oneOf(
      "FAIRNESS_PVALUE_METHOD",
      source.FAIRNESS_PVALUE_METHOD ?? "exact",
      ["exact", "approximate"]
    ),
  };
}

export const env: EngineDefaults = parseEngineDefaults(process.env);
