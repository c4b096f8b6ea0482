const LANCZOS_G = 7;
const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028,
  771.32342877765313, -176.61502916214059, 12.507343278686905,
  -0.13857109526572012, 9.9843695780195716e-6, 1.5056327351493116e-7,
];

const MAX_ITERATIONS = 1000;
const CONVERGENCE_EPS = 1e-14;
const FPMIN = 1e-300;

/** ln Γ(x) by the Lanczos approximation, with reflection below 0.5. */
export function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.sin(Math.PI * x)) - logGamma(1 - x);
  }
  const z = x - 1;
  let a = LANCZOS[0];
  const t = z + LANCZOS_G + 0.5;
  for (let i = 1; i < LANCZOS.length; i++) a += LANCZOS[i] / (z + i);
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

// P(a, x) by its power series; converges quickly for x < a + 1.
function lowerSeries(a: number, x: number): number | undefined {
  let ap = a;
  let del = 1 / a;
  let sum = del;
  for (let n = 1; n <= MAX_ITERATIONS; n++) {
    ap += 1;
    del *= x / ap;
    sum += del;
    if (Math.abs(del) < Math.abs(sum) * CONVERGENCE_EPS) {
      return sum * Math.exp(-x + a * Math.log(x) - logGamma(a));
    }
  }
  return undefined;
}

// Q(a, x) by modified Lentz continued fraction; used for x >= a + 1.
function upperContinuedFraction(a: number, x: number): number | undefined {
  let b = x + 1 - a;
  let c = 1 / FPMIN;
  let d = 1 / b;
  let h = d;
  for (let i = 1; i <= MAX_ITERATIONS; i++) {
    const an = -i * (i - a);
    b += 2;
    d = an * d + b;
    if (Math.abs(d) < FPMIN) d = FPMIN;
    c = b + an / c;
    if (Math.abs(c) < FPMIN) c = FPMIN;
    d = 1 / d;
    const del = d * c;
    h *= del;
    if (Math.abs(del - 1) < CONVERGENCE_EPS) {
      return Math.exp(-x + a * Math.log(x) - logGamma(a)) * h;
    }
  }
  return undefined;
}

/**
 * Regularized upper incomplete gamma Q(a, x) = Γ(a, x) / Γ(a).
 * Returns undefined when neither expansion converges.
 */
export function regularizedGammaQ(a: number, x: number): number | undefined {
  if (Number.isNaN(a) || Number.isNaN(x) || a <= 0 || x < 0) return NaN;
  if (x === 0) return 1;
  if (x === Infinity) return 0;
  if (x < a + 1) {
    const p = lowerSeries(a, x);
    return p === undefined ? undefined : Math.min(1, Math.max(0, 1 - p));
  }
  const q = upperContinuedFraction(a, x);
  return q === undefined ? undefined : Math.min(1, Math.max(0, q));
}
