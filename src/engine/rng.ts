import seedrandom from "seedrandom";

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

export function createRng(seed: number): RandomSource {
  const prng = seedrandom(String(seed));
  return () => prng();
}

// Replays a fixed sequence, cycling when exhausted
export function sequenceRng(values: number[]): RandomSource {
  if (values.length === 0) return () => 0;
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}

export function pickRandom<T>(items: readonly T[], rng: RandomSource): T | null {
  if (items.length === 0) return null;
  const idx = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[idx];
}

// Fisher-Yates, in place
export function shuffle<T>(items: T[], rng: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
