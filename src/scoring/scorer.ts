// pattern: Functional Core

import type { RawRepository } from '../github/types.ts';
import type { ScoredRepository, ScoringConfig, Weights } from './types.ts';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Scales weights so they sum to 1. Throws for negative or non-finite weights
 * and for an all-zero triple, since these are configuration mistakes.
 */
export function normalizeWeights(weights: Weights): Weights {
  const values = [weights.stars, weights.forks, weights.recency];
  if (values.some((w) => !Number.isFinite(w) || w < 0)) {
    throw new Error(
      `scoring weights must be finite and non-negative, got stars=${weights.stars} forks=${weights.forks} recency=${weights.recency}`,
    );
  }

  const sum = weights.stars + weights.forks + weights.recency;
  if (sum <= 0) {
    throw new Error('scoring weights must not all be zero');
  }

  return {
    stars: weights.stars / sum,
    forks: weights.forks / sum,
    recency: weights.recency / sum,
  };
}

export function createScoringConfig(options: {
  readonly weights: Weights;
  readonly halfLifeDays: number;
}): ScoringConfig {
  if (!Number.isFinite(options.halfLifeDays) || options.halfLifeDays <= 0) {
    throw new Error(`half-life must be a positive number of days, got ${options.halfLifeDays}`);
  }

  return {
    weights: normalizeWeights(options.weights),
    halfLifeDays: options.halfLifeDays,
  };
}

/**
 * Whole days elapsed since `updatedAt`, never negative.
 * Partial days are truncated.
 */
export function daysSince(updatedAt: Date, now: Date): number {
  const elapsed = Math.floor((now.getTime() - updatedAt.getTime()) / MS_PER_DAY);
  return Math.max(0, elapsed);
}

/**
 * Exponential recency decay in (0, 1]: 1 for a repository updated today,
 * 0.5 after one half-life. A repository with no update timestamp scores 0.
 */
export function recencyScore(
  updatedAt: Date | null,
  halfLifeDays: number,
  now: Date,
): number {
  if (updatedAt === null) return 0;

  const decayRate = Math.LN2 / halfLifeDays;
  return Math.exp(-decayRate * daysSince(updatedAt, now));
}

export function roundScore(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

/**
 * Scores a repository:
 * - stars and forks contribute on a log scale, ln(1 + n)
 * - recency decays exponentially with the configured half-life
 *
 * @param now Reference time for recency; defaults to the current wall clock
 */
export function scoreRepository(
  repo: RawRepository,
  config: ScoringConfig,
  now: Date = new Date(),
): ScoredRepository {
  const { weights, halfLifeDays } = config;

  const total =
    weights.stars * Math.log1p(repo.stars) +
    weights.forks * Math.log1p(repo.forks) +
    weights.recency * recencyScore(repo.updatedAt, halfLifeDays, now);

  return { ...repo, score: roundScore(total) };
}
