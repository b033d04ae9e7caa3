import seedrandom from 'seedrandom';

export type RandomSource = () => number;

/** Reproducible random source for a seed string. */
export function seededRandom(seed: string): RandomSource {
  const prng = seedrandom(seed);
  return () => prng();
}
