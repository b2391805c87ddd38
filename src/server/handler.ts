// pattern: Imperative Shell

/**
 * Request handling for the repository scoring endpoint.
 * Kept free of node:http so it can be exercised with plain URLs in tests.
 */

import { z } from "zod";
import type { ScoringService } from "../scoring/types.ts";
import { HttpError, type ErrorResponse, type HttpResult } from "./types.ts";

export const REPOS_PATH = "/api/v1/repos";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const RepoQuerySchema = z.object({
  language: z
    .string({ required_error: "language is required" })
    .trim()
    .min(1, "language must not be blank"),
  since: z
    .string({ required_error: "since is required" })
    .regex(ISO_DATE, "since must be a date in YYYY-MM-DD format")
    .transform((value, ctx) => {
      const date = new Date(`${value}T00:00:00Z`);
      if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "since must be a valid calendar date" });
        return z.NEVER;
      }
      return date;
    }),
  q: z.string().optional(),
  limit: z.coerce
    .number({ invalid_type_error: "limit must be a number" })
    .int("limit must be an integer")
    .min(1, "limit must be at least 1")
    .default(100),
});

export type RepoQuery = z.infer<typeof RepoQuerySchema>;

export function parseRepoQuery(params: URLSearchParams): RepoQuery {
  const raw: Record<string, string> = {};
  for (const key of ["language", "since", "q", "limit"]) {
    const value = params.get(key);
    if (value !== null) raw[key] = value;
  }

  const result = RepoQuerySchema.safeParse(raw);
  if (!result.success) {
    throw new HttpError(400, result.error.issues[0]?.message ?? "invalid request");
  }
  return result.data;
}

function errorBody(status: number, message: string, path: string): ErrorResponse {
  return { date: new Date().toISOString(), status, message, path };
}

export async function handleRequest(
  method: string,
  url: URL,
  service: ScoringService,
  signal?: AbortSignal,
): Promise<HttpResult> {
  const path = url.pathname;

  try {
    if (path !== REPOS_PATH) {
      throw new HttpError(404, `no route for ${path}`);
    }
    if (method !== "GET") {
      throw new HttpError(405, `method ${method} not allowed`);
    }

    const query = parseRepoQuery(url.searchParams);
    const body = await service.scoreWithMetadata(
      query.language,
      query.since,
      query.q ?? null,
      query.limit,
      signal,
    );
    return { status: 200, body };
  } catch (error) {
    if (error instanceof HttpError) {
      console.warn(`[server] ${error.status} ${method} ${path}: ${error.message}`);
      return { status: error.status, body: errorBody(error.status, error.message, path) };
    }

    console.error(`[server] unexpected error on ${method} ${path}:`, error);
    const errorMsg = error instanceof Error ? error.message : String(error);
    return { status: 500, body: errorBody(500, `unexpected error: ${errorMsg}`, path) };
  }
}
