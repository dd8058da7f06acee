export type Rng = () => number;

// PRNG déterministe (Mulberry32), reproductible à partir d'une graine
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// FNV-1a 32 bits
export function hashString(s: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function randn(rng: Rng): number {
  // Box-Muller avec PRNG custom
  let u = 0, v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

/** Sans graine: Math.random (marché non reproductible). */
export function createRng(seed?: number | string): Rng {
  if (seed === undefined) return Math.random;
  return mulberry32(typeof seed === "string" ? hashString(seed) : seed);
}
