// pattern: Functional Core

/**
 * Scoring types: configured weights, the scored record and the response
 * envelope handed to the HTTP layer.
 */

import type { RawRepository } from '../github/types.ts';

export type Weights = {
  readonly stars: number;
  readonly forks: number;
  readonly recency: number;
};

/** Normalized weights plus the recency half-life. Fixed for the life of the process. */
export type ScoringConfig = {
  readonly weights: Weights;
  readonly halfLifeDays: number;
};

export type ScoredRepository = RawRepository & {
  readonly score: number;
};

export type ScoredResponse = {
  readonly language: string;
  readonly since: string;
  readonly limit: number;
  readonly count: number;
  readonly total: number;
  readonly data: ReadonlyArray<ScoredRepository>;
};

export type ScoringService = {
  score(
    language: string,
    since: string,
    extraQuery: string | null,
    limit: number,
    signal?: AbortSignal,
  ): Promise<ReadonlyArray<ScoredRepository>>;
  scoreWithMetadata(
    language: string,
    since: Date,
    extraQuery: string | null,
    limit: number,
    signal?: AbortSignal,
  ): Promise<ScoredResponse>;
};

export const DEFAULT_WEIGHTS: Weights = {
  stars: 0.5,
  forks: 0.3,
  recency: 0.2,
};
