// pattern: Functional Core
import { z } from "zod";

const GitHubConfigSchema = z.object({
  base_url: z.string().url().default("https://api.github.com"),
  token: z.string().optional(),
  per_page: z.number().int().min(1).max(100).default(100),
  fetch_timeout: z.number().int().positive().default(30000),
});

const WeightsConfigSchema = z
  .object({
    stars: z.number().nonnegative().default(0.5),
    forks: z.number().nonnegative().default(0.3),
    recency: z.number().nonnegative().default(0.2),
  })
  .superRefine((data, ctx) => {
    if (data.stars + data.forks + data.recency <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one scoring weight must be positive" });
    }
  });

const ScoringConfigSchema = z.object({
  weights: WeightsConfigSchema.default({}),
  half_life_days: z.number().positive().default(30),
});

// Both caches share one TTL and capacity.
const CacheConfigSchema = z.object({
  ttl_seconds: z.number().positive().default(600),
  max_entries: z.number().int().positive().default(1000),
});

const ServerConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(8080),
});

const AppConfigSchema = z.object({
  github: GitHubConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type ScoringSettings = z.infer<typeof ScoringConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export { AppConfigSchema, GitHubConfigSchema, ScoringConfigSchema, CacheConfigSchema, ServerConfigSchema };
