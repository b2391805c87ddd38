// pattern: Functional Core

import { z } from "zod";
import type { RawRepository } from "./types.ts";

// zod strips keys that are not declared, so new upstream fields are ignored.
const GitHubRepoItemSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  owner: z
    .object({ login: z.string() })
    .nullable()
    .optional(),
  html_url: z.string(),
  language: z.string().nullable().optional(),
  stargazers_count: z.number().int().nonnegative(),
  forks_count: z.number().int().nonnegative(),
  updated_at: z.string().datetime({ offset: true }).nullable().optional(),
});

const SearchResponseSchema = z.object({
  total_count: z.number().optional(),
  items: z.array(z.unknown()).default([]),
});

export type GitHubRepoItem = z.infer<typeof GitHubRepoItemSchema>;

export function toRawRepository(item: GitHubRepoItem): RawRepository {
  return {
    name: item.name,
    fullName: item.full_name,
    owner: item.owner?.login ?? "",
    url: item.html_url,
    language: item.language ?? null,
    stars: item.stargazers_count,
    forks: item.forks_count,
    updatedAt: item.updated_at ? new Date(item.updated_at) : null,
  };
}

export type ParsedPage = {
  readonly repositories: ReadonlyArray<RawRepository>;
  readonly skipped: number;
};

/**
 * Parses one search response body. Throws when the envelope itself is malformed;
 * individual items that do not validate are counted in `skipped` and dropped.
 */
export function parseSearchResponse(body: unknown): ParsedPage {
  const envelope = SearchResponseSchema.parse(body);
  const repositories: Array<RawRepository> = [];
  let skipped = 0;

  for (const item of envelope.items) {
    const parsed = GitHubRepoItemSchema.safeParse(item);
    if (parsed.success) {
      repositories.push(toRawRepository(parsed.data));
    } else {
      skipped++;
    }
  }

  return { repositories, skipped };
}
