// pattern: Imperative Shell

/**
 * repo-ranker entry point.
 * Composition root that wires the GitHub client, both caches and the scoring
 * service, then starts the HTTP server.
 */

import { fileURLToPath } from 'node:url';
import type { Server } from 'node:http';
import { loadConfig } from '@/config/config';
import type { AppConfig } from '@/config/schema';
import { createTtlCache } from '@/cache/ttl-cache';
import { createGitHubPageFetcher, createGitHubSearchClient } from '@/github';
import type { PageFetcher, RawRepository } from '@/github';
import { createScoringConfig, createScoringService } from '@/scoring';
import type { ScoredRepository, ScoringService } from '@/scoring';
import { createRepoServer } from '@/server';

export type App = {
  readonly service: ScoringService;
  readonly server: Server;
};

/**
 * Build the application from configuration. Invalid weights, half-life or cache
 * settings throw here, before anything listens.
 * `fetchPage` replaces the GitHub page fetcher (used by tests).
 */
export function createApp(config: AppConfig, fetchPage?: PageFetcher): App {
  const ttlMs = config.cache.ttl_seconds * 1000;

  const repoCache = createTtlCache<ReadonlyArray<RawRepository>>({
    ttl_ms: ttlMs,
    max_entries: config.cache.max_entries,
  });
  const scoreCache = createTtlCache<ReadonlyArray<ScoredRepository>>({
    ttl_ms: ttlMs,
    max_entries: config.cache.max_entries,
  });

  if (!config.github.token) {
    console.warn('no GITHUB_TOKEN provided, using unauthenticated GitHub access (rate-limited)');
  }

  const client = createGitHubSearchClient({
    fetchPage: fetchPage ?? createGitHubPageFetcher(config.github),
    cache: repoCache,
    perPage: config.github.per_page,
  });

  const service = createScoringService({
    client,
    cache: scoreCache,
    config: createScoringConfig({
      weights: config.scoring.weights,
      halfLifeDays: config.scoring.half_life_days,
    }),
  });

  return { service, server: createRepoServer(service) };
}

/**
 * Create a graceful shutdown handler that stops accepting connections.
 * Extracted for testability.
 */
export function createShutdownHandler(server: Server): () => Promise<void> {
  return async (): Promise<void> => {
    console.log('\nShutting down...');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    console.log('server closed');
  };
}

async function main(): Promise<void> {
  console.log('repo-ranker starting...');

  const config = loadConfig();
  const { server } = createApp(config);

  const shutdown = createShutdownHandler(server);
  const onSignal = (): void => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('error during shutdown:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await new Promise<void>((resolve) => {
    server.listen(config.server.port, config.server.host, resolve);
  });
  console.log(`listening on http://${config.server.host}:${config.server.port}`);
}

// Run main entry point only when file is executed directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
