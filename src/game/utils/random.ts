/** Random source returning values in [0, 1). */
export type Rng = () => number;

/**
 * mulberry32: small, fast 32-bit seeded generator. The same seed always
 * yields the same sequence.
 */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [0, maxExclusive). Returns 0 when the range is empty. */
export function randomIndex(rng: Rng, maxExclusive: number): number {
  if (maxExclusive <= 0) return 0;
  const index = Math.floor(rng() * maxExclusive);
  // Guard against generators that return exactly 1.
  return Math.min(index, maxExclusive - 1);
}

/** Fresh 32-bit seed for a new session. */
export function randomSeed(source: Rng = Math.random): number {
  return Math.floor(source() * 4294967296) >>> 0;
}

/**
 * Read a `seed` parameter from a URL query string.
 * Returns null when absent or not a non-negative integer.
 */
export function readSessionSeed(search: string): number | null {
  const raw = new URLSearchParams(search).get("seed");
  if (raw === null || !/^\d+$/.test(raw)) return null;
  const parsed = Number(raw);
  return Number.isSafeInteger(parsed) ? parsed >>> 0 : null;
}
