// pattern: Imperative Shell

/**
 * Scoring service: the entry point the HTTP layer calls.
 * Fetches raw repositories through the search client, scores and sorts them,
 * and caches the sorted list under the same signature the search client uses.
 */

import type { TtlCache } from '../cache/ttl-cache.ts';
import { buildQuerySignature } from '../github/query.ts';
import type { RawRepository, RepoSearchClient } from '../github/types.ts';
import { scoreRepository } from './scorer.ts';
import type { ScoredRepository, ScoredResponse, ScoringConfig, ScoringService } from './types.ts';

/** Upstream search never serves more than this many results for one query. */
export const UPSTREAM_RESULT_CAP = 1000;

type ScoringServiceDeps = {
  readonly client: RepoSearchClient;
  readonly cache: TtlCache<ReadonlyArray<ScoredRepository>>;
  readonly config: ScoringConfig;
  readonly now?: () => Date;
};

function isScorable(repo: RawRepository | null | undefined): repo is RawRepository {
  return (
    repo != null &&
    Number.isFinite(repo.stars) &&
    repo.stars >= 0 &&
    Number.isFinite(repo.forks) &&
    repo.forks >= 0
  );
}

/** UTC start of the given day, e.g. `2024-01-01T00:00:00Z`. */
export function formatSinceDate(since: Date): string {
  return `${since.toISOString().slice(0, 10)}T00:00:00Z`;
}

export function createScoringService(deps: ScoringServiceDeps): ScoringService {
  const { client, cache, config } = deps;
  const now = deps.now ?? (() => new Date());

  function logCacheStats(prefix: string): void {
    const stats = cache.stats();
    console.debug(
      `[scoring] ${prefix} - hits: ${stats.hits}, misses: ${stats.misses}, evictions: ${stats.evictions}, size: ${stats.size}`,
    );
  }

  async function score(
    language: string,
    since: string,
    extraQuery: string | null,
    limit: number,
    signal?: AbortSignal,
  ): Promise<ReadonlyArray<ScoredRepository>> {
    const cacheKey = buildQuerySignature(language, since, extraQuery, limit);

    const cached = cache.get(cacheKey);
    if (cached) {
      logCacheStats(`cache hit for key ${cacheKey}`);
      return cached;
    }

    const raw = await client.search(language, since, extraQuery, limit, signal);
    const scoredAt = now();

    // Array.prototype.sort is stable, so equal scores keep fetch order.
    const sorted = raw
      .filter(isScorable)
      .map((repo) => scoreRepository(repo, config, scoredAt))
      .sort((a, b) => b.score - a.score);

    if (signal?.aborted) {
      return sorted;
    }

    cache.set(cacheKey, sorted);
    logCacheStats(`cache updated for key ${cacheKey}`);
    return sorted;
  }

  return {
    score,

    async scoreWithMetadata(language, since, extraQuery, limit, signal): Promise<ScoredResponse> {
      const sinceString = formatSinceDate(since);
      const data = await score(language, sinceString, extraQuery, limit, signal);

      return {
        language,
        since: sinceString,
        limit,
        count: data.length,
        total: Math.min(data.length, UPSTREAM_RESULT_CAP),
        data,
      };
    },
  };
}
