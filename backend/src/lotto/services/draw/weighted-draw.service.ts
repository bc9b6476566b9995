import { Inject, Injectable } from '@nestjs/common';
import { DATASET_SIZE, LOTTO_CONFIG } from '../../constants/lotto.config';
import { DrawPreconditionError } from '../../errors/draw-precondition.error';
import { DrawBatch, DrawOptions, DrawResult, RandomSource, WeightedNumber } from '../../interfaces/draw.interface';
import { FrequencyRecord } from '../../interfaces/stats.interface';
import { findDatasetProblems, sortByNumber } from '../../utils/dataset.util';

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export const DEFAULT_DRAW_OPTIONS: DrawOptions = { ...LOTTO_CONFIG.draw };

/**
 * Sampling weight per number: count + smoothing, ascending by number
 */
export function computeWeights(dataset: readonly FrequencyRecord[], smoothing: number): WeightedNumber[] {
  return sortByNumber(dataset).map((record) => ({
    number: record.number,
    weight: record.count + smoothing,
  }));
}

/**
 * Index into `pool` chosen with probability proportional to weight
 */
function pickWeightedIndex(pool: readonly WeightedNumber[], random: RandomSource): number {
  const total = pool.reduce((sum, item) => sum + item.weight, 0);
  if (!(total > 0)) {
    throw new DrawPreconditionError(`Remaining weights sum to ${total}; cannot sample`);
  }

  const target = random() * total;
  let cumulative = 0;
  let lastPositive = -1;

  for (let i = 0; i < pool.length; i++) {
    if (pool[i].weight <= 0) continue;
    cumulative += pool[i].weight;
    lastPositive = i;
    if (target < cumulative) return i;
  }

  // Float rounding can leave target == total
  return lastPositive;
}

/**
 * Weighted Draw Service
 *
 * Each set draws `pickSize` numbers without replacement, weights
 * proportional to count + smoothing. The first pickSize - 1 picks are the
 * main numbers (sorted), the last is the bonus. Sets are independent and
 * may repeat numbers across the batch.
 */
@Injectable()
export class WeightedDrawService {
  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  generate(dataset: readonly FrequencyRecord[], options: Partial<DrawOptions> = {}): DrawBatch {
    const numSets = options.numSets ?? DEFAULT_DRAW_OPTIONS.numSets;
    const pickSize = options.pickSize ?? DEFAULT_DRAW_OPTIONS.pickSize;
    const smoothing = options.smoothing ?? DEFAULT_DRAW_OPTIONS.smoothing;
    this.assertPreconditions(dataset, numSets, pickSize, smoothing);

    const weights = computeWeights(dataset, smoothing);
    const batch: DrawBatch = [];

    for (let set = 0; set < numSets; set++) {
      batch.push(this.drawSet(weights, pickSize));
    }

    return batch;
  }

  private drawSet(weights: readonly WeightedNumber[], pickSize: number): DrawResult {
    const pool = [...weights];
    const picks: number[] = [];

    for (let i = 0; i < pickSize; i++) {
      const index = pickWeightedIndex(pool, this.random);
      picks.push(pool[index].number);
      pool.splice(index, 1);
    }

    return {
      mainNumbers: picks.slice(0, -1).sort((a, b) => a - b),
      bonusNumber: picks[picks.length - 1],
    };
  }

  private assertPreconditions(
    dataset: readonly FrequencyRecord[],
    numSets: number,
    pickSize: number,
    smoothing: number,
  ): void {
    const problems = findDatasetProblems(dataset);
    if (problems.length > 0) {
      throw new DrawPreconditionError('Malformed dataset', problems);
    }
    if (!Number.isInteger(numSets) || numSets < 1) {
      throw new DrawPreconditionError(`numSets must be a positive integer, got ${numSets}`);
    }
    if (!Number.isInteger(pickSize) || pickSize < 2 || pickSize > DATASET_SIZE) {
      throw new DrawPreconditionError(`pickSize must be an integer in [2, ${DATASET_SIZE}], got ${pickSize}`);
    }
    if (!Number.isFinite(smoothing) || smoothing < 0) {
      throw new DrawPreconditionError(`smoothing must be a finite non-negative number, got ${smoothing}`);
    }
  }
}
