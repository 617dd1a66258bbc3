import seedrandom from "seedrandom";

export type Rng = () => number;

export function createRng(seed?: string | number): Rng {
  if (seed === undefined) return Math.random;
  const prng = seedrandom(String(seed));
  return () => prng();
}

export function uniform(rng: Rng, min: number, max: number): number {
  if (max <= min) return min;
  return min + rng() * (max - min);
}

export function pick<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(rng() * items.length), items.length - 1);
  return items[index];
}
