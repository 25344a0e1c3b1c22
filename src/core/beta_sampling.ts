export type RandomSource = () => number;

// Math.random can return exactly 0; the log transforms below need (0, 1).
function openUnit(rng: RandomSource): number {
  let u = rng();
  while (u <= 0 || u >= 1) {
    u = rng();
  }
  return u;
}

function sampleStandardNormal(rng: RandomSource): number {
  const u1 = openUnit(rng);
  const u2 = openUnit(rng);
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Marsaglia-Tsang; shape < 1 is boosted to shape + 1 and scaled back. */
export function sampleGamma(shape: number, rng: RandomSource = Math.random): number {
  if (!Number.isFinite(shape) || shape <= 0) {
    throw new RangeError(`Gamma shape must be > 0, got ${shape}`);
  }
  if (shape < 1) {
    return sampleGamma(shape + 1, rng) * Math.pow(openUnit(rng), 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x: number;
    let v: number;
    do {
      x = sampleStandardNormal(rng);
      v = 1 + c * x;
    } while (v <= 0);

    v = v * v * v;
    const u = openUnit(rng);
    if (u < 1 - 0.0331 * x * x * x * x) return d * v;
    if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
  }
}

export function sampleBeta(alpha: number, beta: number, rng: RandomSource = Math.random): number {
  const x = sampleGamma(alpha, rng);
  const y = sampleGamma(beta, rng);
  const sum = x + y;
  if (sum <= 0) return 0.5;
  return x / sum;
}

/** Deterministic generator for reproducible draws (mulberry32). */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
