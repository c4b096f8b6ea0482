import { logGamma } from "./gamma";

// PMF values within this relative distance of PMF(k) count as "as extreme".
const RELATIVE_TOLERANCE = 1e-7;

/** ln P(X = k) for X ~ Binomial(n, p). */
export function logBinomialPmf(k: number, n: number, p: number): number {
  if (k < 0 || k > n) return -Infinity;
  if (p <= 0) return k === 0 ? 0 : -Infinity;
  if (p >= 1) return k === n ? 0 : -Infinity;
  return (
    logGamma(n + 1) -
    logGamma(k + 1) -
    logGamma(n - k + 1) +
    k * Math.log(p) +
    (n - k) * Math.log1p(-p)
  );
}

/**
 * Exact two-sided binomial test: the total probability of every count
 * whose PMF is no larger than the PMF of the observed count `k`.
 */
export function binomialTwoSidedPValue(k: number, n: number, p: number): number {
  if (n <= 0) return NaN;
  const threshold = logBinomialPmf(k, n, p) + Math.log1p(RELATIVE_TOLERANCE);
  let total = 0;
  for (let x = 0; x <= n; x++) {
    const lx = logBinomialPmf(x, n, p);
    if (lx <= threshold) total += Math.exp(lx);
  }
  return Math.min(1, total);
}
