// pattern: Imperative Shell

import type { PageFetcher } from "./types.ts";
import { parseSearchResponse } from "./schema.ts";

type PageFetcherConfig = {
  readonly base_url: string;
  readonly per_page: number;
  readonly fetch_timeout: number;
  readonly token?: string;
};

export function createGitHubPageFetcher(config: PageFetcherConfig): PageFetcher {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
  };
  const token = config.token?.trim();
  if (token) {
    headers["Authorization"] = `Bearer ${token}`;
  }

  return async (query, page, signal) => {
    const url = new URL(`${config.base_url.replace(/\/+$/, "")}/search/repositories`);
    url.searchParams.set("q", query);
    url.searchParams.set("sort", "stars");
    url.searchParams.set("order", "desc");
    url.searchParams.set("per_page", String(config.per_page));
    url.searchParams.set("page", String(page));

    const timeout = AbortSignal.timeout(config.fetch_timeout);

    let response: Response;
    try {
      response = await fetch(url, {
        headers,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new Error(`github search page ${page} timed out after ${config.fetch_timeout}ms`);
      }
      throw error;
    }

    if (!response.ok) {
      throw new Error(`github search failed: ${response.status} ${response.statusText}`);
    }

    const { repositories, skipped } = parseSearchResponse(await response.json());
    if (skipped > 0) {
      console.warn(`[github] skipped ${skipped} malformed item(s) on page ${page}`);
    }

    return repositories;
  };
}
