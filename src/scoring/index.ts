// pattern: Functional Core

export type { Weights, ScoringConfig, ScoredRepository, ScoredResponse, ScoringService } from './types.ts';
export { DEFAULT_WEIGHTS } from './types.ts';
export { normalizeWeights, createScoringConfig, scoreRepository } from './scorer.ts';
export { createScoringService, formatSinceDate, UPSTREAM_RESULT_CAP } from './service.ts';
