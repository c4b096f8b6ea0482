import { logger } from "../common/logger";
import { ConfigurationError } from "../errors";
import type { PValueMethodName } from "../types";
import { regularizedGammaQ } from "./gamma";
import { normalSurvival } from "./normal";

/**
 * Strategy for the right-tail probability of the chi-square distribution.
 * `undefined` means the method could not produce a value for this input.
 */
export interface PValueMethod {
  readonly name: PValueMethodName;
  chiSquareSurvival(x: number, df: number): number | undefined;
}

/** Q(df/2, x/2) through the regularized incomplete gamma function. */
export const exactMethod: PValueMethod = {
  name: "exact",
  chiSquareSurvival(x, df) {
    return regularizedGammaQ(df / 2, x / 2);
  },
};

/**
 * Wilson–Hilferty: (X/df)^(1/3) is close to normal with mean 1 − 2/(9df)
 * and variance 2/(9df).
 */
export const approximateMethod: PValueMethod = {
  name: "approximate",
  chiSquareSurvival(x, df) {
    const v = 2 / (9 * df);
    const z = (Math.cbrt(x / df) - (1 - v)) / Math.sqrt(v);
    return normalSurvival(z);
  },
};

export function resolvePValueMethod(
  method: PValueMethodName | PValueMethod
): PValueMethod {
  if (typeof method !== "string") return method;
  switch (method) {
    case "exact":
      return exactMethod;
    case "approximate":
      return approximateMethod;
    default:
      throw new ConfigurationError(`Unknown p-value method: ${String(method)}`);
  }
}

export interface ChiSquarePValue {
  pValue: number;
  method: PValueMethodName;
}

/**
 * Right-tail p-value of `x` under chi-square with `df` degrees of freedom.
 * Falls back to the approximate method, and says so, when the chosen
 * method returns nothing.
 */
export function chiSquarePValue(
  x: number,
  df: number,
  method: PValueMethod
): ChiSquarePValue {
  if (!(df > 0) || Number.isNaN(x)) {
    return { pValue: NaN, method: method.name };
  }
  const value = method.chiSquareSurvival(x, df);
  if (value !== undefined) return { pValue: value, method: method.name };

  logger.warn(
    { method: method.name, chiSquare: x, df },
    "p-value method produced no value; using approximation"
  );
  return {
    pValue: approximateMethod.chiSquareSurvival(x, df) ?? NaN,
    method: approximateMethod.name,
  };
}
