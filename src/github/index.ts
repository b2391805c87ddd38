// pattern: Functional Core

export type { RawRepository, PageFetcher, RepoSearchClient } from "./types.ts";
export { buildSearchQuery, buildQuerySignature } from "./query.ts";
export { parseSearchResponse } from "./schema.ts";
export { createGitHubPageFetcher } from "./page-fetcher.ts";
export { createGitHubSearchClient, MAX_PAGES } from "./client.ts";
