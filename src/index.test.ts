// pattern: Imperative Shell

import { describe, it, expect, vi } from 'vitest';
import { AppConfigSchema } from '@/config/schema';
import type { PageFetcher, RawRepository } from '@/github';
import { handleRequest } from '@/server';
import { createApp, createShutdownHandler } from './index.ts';

function repo(name: string, stars: number, forks: number): RawRepository {
  return {
    name,
    fullName: `octo/${name}`,
    owner: 'octo',
    url: `https://github.com/octo/${name}`,
    language: 'Kotlin',
    stars,
    forks,
    updatedAt: null,
  };
}

describe('createApp', () => {
  it('wires the search client, caches and scoring service together', async () => {
    const fetchPage = vi.fn<PageFetcher>(async (_query, page) =>
      page === 1 ? [repo('small', 1, 0), repo('big', 900, 40)] : [repo('mid', 50, 3)],
    );
    const config = AppConfigSchema.parse({ github: { token: 'test-token', per_page: 2 } });
    const { service } = createApp(config, fetchPage);

    const first = await service.score('Kotlin', '2024-01-01', null, 3);
    const second = await service.score('Kotlin', '2024-01-01', null, 3);

    expect(first.map((r) => r.name)).toEqual(['big', 'mid', 'small']);
    expect(second).toBe(first);
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(fetchPage.mock.calls[0]?.[0]).toBe('language:Kotlin created:>2024-01-01');
  });

  it('serves the metadata response through the request handler', async () => {
    const fetchPage = vi.fn<PageFetcher>(async () => [repo('only', 3, 1)]);
    const { service } = createApp(AppConfigSchema.parse({ github: { token: 'test-token' } }), fetchPage);

    const result = await handleRequest(
      'GET',
      new URL('http://localhost/api/v1/repos?language=Kotlin&since=2024-01-01&limit=5'),
      service,
    );

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      language: 'Kotlin',
      since: '2024-01-01T00:00:00Z',
      limit: 5,
      count: 1,
      total: 1,
    });
    expect(fetchPage.mock.calls[0]?.[0]).toBe('language:Kotlin created:>2024-01-01T00:00:00Z');
  });
});

describe('createShutdownHandler', () => {
  it('closes a listening server', async () => {
    const fetchPage = vi.fn<PageFetcher>(async () => []);
    const { server } = createApp(AppConfigSchema.parse({ github: { token: 'test-token' } }), fetchPage);

    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', resolve);
    });
    expect(server.listening).toBe(true);

    await createShutdownHandler(server)();

    expect(server.listening).toBe(false);
  });
});
