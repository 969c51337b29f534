export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? null;
  const lower = sorted[mid - 1];
  const upper = sorted[mid];
  if (lower === undefined || upper === undefined) return null;
  return (lower + upper) / 2;
}

// Bessel-corrected; null below two samples.
export function sampleStandardDeviation(values: number[]): number | null {
  if (values.length < 2) return null;
  const avg = mean(values) ?? 0;
  const sumSq = values.reduce((acc, value) => acc + (value - avg) ** 2, 0);
  return Math.sqrt(sumSq / (values.length - 1));
}

export function medianAbsoluteDeviation(values: number[]): number | null {
  const center = median(values);
  if (center === null) return null;
  return median(values.map((value) => Math.abs(value - center)));
}

/** Drops values further than `nMad` median absolute deviations from the median. */
export function filterOutliersMad(values: number[], nMad: number): number[] {
  const center = median(values);
  const mad = medianAbsoluteDeviation(values);
  if (center === null || mad === null || mad === 0) return [...values];
  const lower = center - nMad * mad;
  const upper = center + nMad * mad;
  return values.filter((value) => value >= lower && value <= upper);
}

const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
];

function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.sin(Math.PI * x)) - logGamma(1 - x);
  }
  const z = x - 1;
  let acc = LANCZOS[0] ?? 1;
  for (let i = 1; i < LANCZOS.length; i += 1) {
    acc += (LANCZOS[i] ?? 0) / (z + i);
  }
  const t = z + 7.5;
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(acc);
}

function betaContinuedFraction(a: number, b: number, x: number): number {
  const maxIterations = 200;
  const epsilon = 3e-14;
  const tiny = 1e-300;
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < tiny) d = tiny;
  d = 1 / d;
  let h = d;
  for (let m = 1; m <= maxIterations; m += 1) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    h *= d * c;
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < epsilon) break;
  }
  return h;
}

export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x),
  );
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/** Two-sided tail probability of Student's t distribution. */
export function studentTTwoSidedP(t: number, degreesOfFreedom: number): number {
  if (!Number.isFinite(t)) return 0;
  const x = degreesOfFreedom / (degreesOfFreedom + t * t);
  return regularizedIncompleteBeta(x, degreesOfFreedom / 2, 0.5);
}

export type PairedTestResult = {
  n: number;
  // mean of (a - b); positive means the second sequence has lower values
  meanDifference: number | null;
  standardDeviation: number | null;
  tStatistic: number | null;
  degreesOfFreedom: number | null;
  pValue: number | null;
  // Cohen's d_z; null when undefined
  effectSize: number | null;
};

export function pairedTTest(a: number[], b: number[]): PairedTestResult {
  if (a.length !== b.length) {
    throw new RangeError(`Paired samples differ in length: ${a.length} vs ${b.length}`);
  }
  const differences = a.map((value, index) => value - (b[index] ?? 0));
  const n = differences.length;
  const meanDifference = mean(differences);
  const sd = sampleStandardDeviation(differences);
  if (meanDifference === null || sd === null) {
    return {
      n,
      meanDifference,
      standardDeviation: sd,
      tStatistic: null,
      degreesOfFreedom: null,
      pValue: null,
      effectSize: null,
    };
  }

  const degreesOfFreedom = n - 1;
  if (sd === 0) {
    const identical = meanDifference === 0;
    return {
      n,
      meanDifference,
      standardDeviation: 0,
      tStatistic: identical ? 0 : Math.sign(meanDifference) * Infinity,
      degreesOfFreedom,
      pValue: identical ? 1 : 0,
      effectSize: identical ? 0 : null,
    };
  }

  const tStatistic = meanDifference / (sd / Math.sqrt(n));
  return {
    n,
    meanDifference,
    standardDeviation: sd,
    tStatistic,
    degreesOfFreedom,
    pValue: studentTTwoSidedP(tStatistic, degreesOfFreedom),
    effectSize: meanDifference / sd,
  };
}
