import { RandomSource } from '../interfaces/draw.interface';

// Park-Miller LCG
const LCG_MULTIPLIER = 48271;
const LCG_MODULUS = 2147483647;

/**
 * Deterministic RandomSource: same seed, same sequence.
 * Used for reproducible draws in tests and debugging.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = ((Math.trunc(seed) % (LCG_MODULUS - 1)) + (LCG_MODULUS - 1)) % (LCG_MODULUS - 1) + 1;

  return () => {
    state = (state * LCG_MULTIPLIER) % LCG_MODULUS;
    return (state - 1) / (LCG_MODULUS - 1);
  };
}

export const defaultRandom: RandomSource = () => Math.random();
