/**
 * Tests for GitHubWatcher
 *
 * Octokit is real; only its fetch is replaced.
 */

import { describe, it, expect, vi } from 'vitest';
import { Octokit } from 'octokit';
import { GitHubWatcher } from '../../src/watchers/github';
import { jsonResponse, makeTarget } from '../helpers';

const TARGET = makeTarget();
const OPTIONS = { timeoutMs: 5000, maxItems: 10 };

const REPOSITORY = {
  id: 1,
  full_name: 'alpha-org/alpha',
  description: 'Coming soon: Alpha weights',
  html_url: 'https://github.com/alpha-org/alpha',
  created_at: '2026-01-01T00:00:00Z',
  stargazers_count: 12,
  forks_count: 3,
  language: 'Rust',
};

const COMMITS = [
  {
    sha: 'a1b2c3d4e5f6',
    html_url: 'https://github.com/alpha-org/alpha/commit/a1b2c3d4e5f6',
    commit: {
      message: 'Add sampler\n\nDetails follow',
      author: { name: 'Ada', date: '2026-02-01T10:00:00Z' },
      committer: { name: 'Ada', date: '2026-02-01T10:05:00Z' },
    },
  },
];

const RELEASES = [
  {
    id: 101,
    tag_name: 'v1.0.0',
    name: 'Alpha 1.0',
    body: 'Weights released',
    draft: false,
    prerelease: false,
    html_url: 'https://github.com/alpha-org/alpha/releases/tag/v1.0.0',
    created_at: '2026-02-02T00:00:00Z',
    published_at: '2026-02-02T01:00:00Z',
    assets: [{ id: 1 }],
  },
  {
    id: 102,
    tag_name: 'v2.0.0',
    name: 'Unpublished draft',
    body: '',
    draft: true,
    prerelease: false,
    html_url: 'https://github.com/alpha-org/alpha/releases/tag/untagged',
    created_at: '2026-02-04T00:00:00Z',
    published_at: null,
    assets: [],
  },
  {
    id: 103,
    tag_name: 'v1.1.0-rc1',
    name: null,
    body: 'Release candidate',
    draft: false,
    prerelease: true,
    html_url: 'https://github.com/alpha-org/alpha/releases/tag/v1.1.0-rc1',
    created_at: '2026-02-03T00:00:00Z',
    published_at: '2026-02-03T00:00:00Z',
    assets: [],
  },
];

type Route = () => Response;

function githubApi(routes: Record<string, Route>) {
  return vi.fn(async (url: string) => {
    const route = routes[new URL(url).pathname];
    return route ? route() : jsonResponse({ message: 'Not Found' }, 404, 'Not Found');
  });
}

function watcherWith(fetchMock: ReturnType<typeof githubApi>): GitHubWatcher {
  return new GitHubWatcher(OPTIONS, new Octokit({ request: { fetch: fetchMock } }));
}

describe('GitHubWatcher', () => {
  it('should report the repository, its commits and its published releases', async () => {
    const fetchMock = githubApi({
      '/repos/alpha-org/alpha': () => jsonResponse(REPOSITORY),
      '/repos/alpha-org/alpha/commits': () => jsonResponse(COMMITS),
      '/repos/alpha-org/alpha/releases': () => jsonResponse(RELEASES),
    });

    const result = await watcherWith(fetchMock).safeFetch(TARGET);

    expect(result.ok).toBe(true);
    if (!result.ok || result.snapshot.kind !== 'items') return expect.fail('expected an item snapshot');

    const { items } = result.snapshot;
    expect(items.map(item => [item.id, item.category, item.title, item.releaseStage])).toEqual([
      ['repo:alpha-org/alpha', 'repository', 'Repository discovered: alpha-org/alpha', 'launched'],
      ['a1b2c3d4e5f6', 'commit', 'Add sampler', 'unknown'],
      ['release:101', 'release', 'Release: v1.0.0', 'launched'],
      ['release:103', 'release', 'Pre-release: v1.1.0-rc1', 'announced'],
    ]);

    expect(items[0]).toMatchObject({
      fingerprint: '2026-01-01T00:00:00Z',
      description: 'Coming soon: Alpha weights',
      url: 'https://github.com/alpha-org/alpha',
      metadata: { stars: 12, forks: 3, language: 'Rust' },
    });
    expect(items[1]).toMatchObject({
      fingerprint: 'a1b2c3d4e5f6',
      description: 'Author: Ada',
      timestamp: '2026-02-01T10:00:00Z',
      metadata: { sha: 'a1b2c3d', author: 'Ada' },
    });
    expect(items[2]).toMatchObject({
      fingerprint: 'v1.0.0@2026-02-02T01:00:00Z',
      description: 'Alpha 1.0',
      metadata: { tag: 'v1.0.0', prerelease: false, hasAssets: true },
    });
    expect(items[3]).toMatchObject({
      description: 'Release candidate',
      metadata: { tag: 'v1.1.0-rc1', prerelease: true, hasAssets: false },
    });
  });

  it('should ask for at most maxItems commits and releases', async () => {
    const fetchMock = githubApi({
      '/repos/alpha-org/alpha': () => jsonResponse(REPOSITORY),
      '/repos/alpha-org/alpha/commits': () => jsonResponse([]),
      '/repos/alpha-org/alpha/releases': () => jsonResponse([]),
    });

    await watcherWith(fetchMock).safeFetch(TARGET);

    const urls = fetchMock.mock.calls.map(([url]) => url);
    expect(urls).toContain('https://api.github.com/repos/alpha-org/alpha/commits?per_page=10');
    expect(urls).toContain('https://api.github.com/repos/alpha-org/alpha/releases?per_page=10');
  });

  it('should call a repository without releases an announcement', async () => {
    const fetchMock = githubApi({
      '/repos/alpha-org/alpha': () => jsonResponse({ ...REPOSITORY, description: null }),
      '/repos/alpha-org/alpha/commits': () => jsonResponse([]),
      '/repos/alpha-org/alpha/releases': () => jsonResponse([]),
    });

    const result = await watcherWith(fetchMock).safeFetch(TARGET);
    if (!result.ok || result.snapshot.kind !== 'items') return expect.fail('expected an item snapshot');

    expect(result.snapshot.items).toHaveLength(1);
    expect(result.snapshot.items[0].releaseStage).toBe('announced');
    expect(result.snapshot.items[0].description).toBeUndefined();
  });

  it('should return an empty snapshot while the repository does not exist', async () => {
    const fetchMock = githubApi({});

    const result = await watcherWith(fetchMock).safeFetch(TARGET);

    expect(result).toMatchObject({ ok: true, snapshot: { kind: 'items', source: 'github', items: [] } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should fail the pair when the API rejects the token', async () => {
    const fetchMock = githubApi({
      '/repos/alpha-org/alpha': () => jsonResponse({ message: 'Bad credentials' }, 401, 'Unauthorized'),
    });

    const result = await watcherWith(fetchMock).safeFetch(TARGET);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(401);
      expect(result.error.source).toBe('github');
    }
  });

  it('should fail on a malformed repository slug', async () => {
    const fetchMock = githubApi({});
    const result = await watcherWith(fetchMock).safeFetch({ ...TARGET, identifier: 'no-slash' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('GitHub repository must be "owner/name", got "no-slash"');
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
