/**
 * Descriptive statistics and the Pearson significance test.
 *
 * All functions are pure. Degenerate inputs (empty, zero variance) produce
 * NaN rather than throwing; callers decide how to report them.
 */

/**
 * Arithmetic mean. NaN for an empty sequence.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return NaN;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Population standard deviation (divisor n).
 */
export function populationStd(values: readonly number[]): number {
  const mu = mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - mu) * (value - mu);
  }
  return Math.sqrt(squares / values.length);
}

/**
 * Pearson correlation coefficient of two equal-length sequences.
 *
 * r = Σ[(xᵢ - x̄)(yᵢ - ȳ)] / √[Σ(xᵢ - x̄)² · Σ(yᵢ - ȳ)²]
 *
 * @returns r in [-1, 1]; NaN when lengths differ, fewer than 2 points, or
 *   either sequence is constant
 */
export function pearson(x: readonly number[], y: readonly number[]): number {
  const n = x.length;
  if (n !== y.length || n < 2) {
    return NaN;
  }

  const meanX = mean(x);
  const meanY = mean(y);
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;

  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? NaN) - meanX;
    const dy = (y[i] ?? NaN) - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  const denominator = Math.sqrt(varianceX * varianceY);
  if (denominator === 0) {
    return NaN;
  }

  // Rounding can push |r| fractionally past 1 for perfectly linear inputs
  return Math.max(-1, Math.min(1, covariance / denominator));
}

/**
 * Natural log of the gamma function (Lanczos approximation, g = 7).
 */
export function logGamma(z: number): number {
  if (z < 0.5) {
    // Reflection formula
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * z))) - logGamma(1 - z);
  }

  const coefficients = [
    0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
    -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
    1.5056327351493116e-7,
  ];

  const x = z - 1;
  let series = coefficients[0] ?? 0;
  for (let i = 1; i < coefficients.length; i++) {
    series += (coefficients[i] ?? 0) / (x + i);
  }
  const t = x + 7.5;

  return 0.5 * Math.log(2 * Math.PI) + (x + 0.5) * Math.log(t) - t + Math.log(series);
}

const BETA_MAX_ITERATIONS = 200;
const BETA_EPSILON = 3e-16;
const BETA_FPMIN = 1e-300;

/**
 * Continued fraction for the incomplete beta function (modified Lentz).
 */
function betaContinuedFraction(x: number, a: number, b: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < BETA_FPMIN) d = BETA_FPMIN;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= BETA_MAX_ITERATIONS; m++) {
    const m2 = 2 * m;

    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < BETA_FPMIN) d = BETA_FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < BETA_FPMIN) c = BETA_FPMIN;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < BETA_FPMIN) d = BETA_FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < BETA_FPMIN) c = BETA_FPMIN;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < BETA_EPSILON) {
      break;
    }
  }

  return h;
}

/**
 * Regularized incomplete beta function I_x(a, b).
 */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const logFront =
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x);
  const front = Math.exp(logFront);

  // The continued fraction converges fastest below the distribution mean
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(x, a, b)) / a;
  }
  return 1 - (front * betaContinuedFraction(1 - x, b, a)) / b;
}

/**
 * Two-tailed p-value of a Pearson coefficient `r` over `n` pairs, from
 * Student's t with n - 2 degrees of freedom:
 *
 * t = r·√((n-2)/(1-r²)),  p = I_{df/(df+t²)}(df/2, 1/2)
 *
 * @returns p in [0, 1]; 1 when n < 3 or r is not finite
 */
export function pearsonPValue(r: number, n: number): number {
  const df = n - 2;
  if (df < 1 || !Number.isFinite(r)) {
    return 1;
  }

  const r2 = r * r;
  if (r2 >= 1) {
    return 0;
  }

  const t2 = (r2 * df) / (1 - r2);
  const p = regularizedIncompleteBeta(df / (df + t2), df / 2, 0.5);
  return Math.max(0, Math.min(1, p));
}
