// pattern: Imperative Shell

/**
 * Paginating search client with a raw result cache in front of it.
 *
 * Pages are requested concurrently and reassembled by page index, so the merged
 * sequence keeps the upstream ordering regardless of which response lands first.
 * A page that fails contributes nothing; the query returns whatever the other
 * pages produced.
 */

import type { TtlCache } from "../cache/ttl-cache.ts";
import { buildQuerySignature, buildSearchQuery } from "./query.ts";
import type { PageFetcher, RawRepository, RepoSearchClient } from "./types.ts";

/** The search endpoint serves at most 1000 results, i.e. 10 pages of 100. */
export const MAX_PAGES = 10;

type GitHubSearchClientOptions = {
  readonly fetchPage: PageFetcher;
  readonly cache: TtlCache<ReadonlyArray<RawRepository>>;
  readonly perPage: number;
};

export function pageCount(limit: number, perPage: number): number {
  return Math.min(Math.ceil(limit / perPage), MAX_PAGES);
}

export function createGitHubSearchClient(options: GitHubSearchClientOptions): RepoSearchClient {
  const { fetchPage, cache, perPage } = options;

  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new Error(`perPage must be a positive integer, got ${perPage}`);
  }

  async function fetchPageOrEmpty(
    query: string,
    page: number,
    signal: AbortSignal | undefined,
  ): Promise<ReadonlyArray<RawRepository>> {
    try {
      return await fetchPage(query, page, signal);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.warn(`[github] page ${page} for "${query}" failed, treating as empty: ${errorMsg}`);
      return [];
    }
  }

  return {
    async search(language, since, extraQuery, limit, signal) {
      const cacheKey = buildQuerySignature(language, since, extraQuery, limit);

      const cached = cache.get(cacheKey);
      if (cached && cached.length > 0) {
        console.debug(`[github] cache hit for ${cacheKey}`);
        return cached;
      }

      console.debug(`[github] cache miss for ${cacheKey}, fetching from upstream`);

      const query = buildSearchQuery(language, since, extraQuery);
      const pages = Array.from({ length: pageCount(limit, perPage) }, (_, i) => i + 1);

      const results = await Promise.all(
        pages.map((page) => fetchPageOrEmpty(query, page, signal)),
      );
      const repositories = results.flat().slice(0, limit);

      if (signal?.aborted) {
        return repositories;
      }

      cache.set(cacheKey, repositories);
      return repositories;
    },
  };
}
