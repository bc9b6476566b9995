export interface DrawResult {
  mainNumbers: number[]; // ascending
  bonusNumber: number; // as drawn
}

export type DrawBatch = DrawResult[];

export interface DrawOptions {
  numSets: number;
  pickSize: number; // main numbers + 1 bonus
  smoothing: number; // added to every count before sampling
}

/**
 * Uniform float in [0, 1)
 */
export type RandomSource = () => number;

export interface WeightedNumber {
  number: number;
  weight: number;
}
