// pattern: Functional Core

/**
 * Shared types for the GitHub repository search pipeline.
 * These define the port that the scoring service consumes and the record shape
 * every upstream page is normalised to.
 */

export type RawRepository = {
  readonly name: string;
  readonly fullName: string;
  readonly owner: string;
  readonly url: string;
  readonly language: string | null;
  readonly stars: number;
  readonly forks: number;
  readonly updatedAt: Date | null;
};

export type PageFetcher = (
  query: string,
  page: number,
  signal?: AbortSignal,
) => Promise<ReadonlyArray<RawRepository>>;

export interface RepoSearchClient {
  search(
    language: string,
    since: string,
    extraQuery: string | null,
    limit: number,
    signal?: AbortSignal,
  ): Promise<ReadonlyArray<RawRepository>>;
}
