/**
 * Release Radar: GitHub Watcher
 *
 * Watches one repository: its existence, latest commits and latest releases.
 * A repository that does not exist yet is an empty snapshot, so its
 * creation shows up as `repo_created` later.
 */

import { Octokit } from 'octokit';
import type { Item, ItemSnapshot, WatchTarget } from '../types';
import { statusOf } from '../lib/errors';
import { detectReleaseStage } from '../lib/release-stage';
import { SourceWatcher, USER_AGENT, firstLine, truncate, type WatcherOptions } from './base';

// ============================================================
// TYPES
// ============================================================

type RepositoryData = Awaited<ReturnType<Octokit['rest']['repos']['get']>>['data'];
type CommitData = Awaited<ReturnType<Octokit['rest']['repos']['listCommits']>>['data'][number];
type ReleaseData = Awaited<ReturnType<Octokit['rest']['repos']['listReleases']>>['data'][number];

export function createOctokit(token?: string): Octokit {
  return new Octokit({
    ...(token ? { auth: token } : {}),
    userAgent: USER_AGENT,
  });
}

function parseRepo(identifier: string): { owner: string; repo: string } {
  const [owner, repo] = identifier.split('/');
  if (!owner || !repo) {
    throw new Error(`GitHub repository must be "owner/name", got "${identifier}"`);
  }
  return { owner, repo };
}

// ============================================================
// WATCHER
// ============================================================

export class GitHubWatcher extends SourceWatcher {
  readonly kind = 'github' as const;

  constructor(
    options: WatcherOptions,
    private readonly octokit: Octokit
  ) {
    super(options);
  }

  async fetch(target: WatchTarget, signal: AbortSignal): Promise<ItemSnapshot> {
    const { owner, repo } = parseRepo(target.identifier);
    const fetchedAt = new Date().toISOString();

    const repository = await this.getRepository(owner, repo, signal);
    if (!repository) {
      this.logger.debug('Repository not found yet', { repo: target.identifier });
      return { kind: 'items', source: this.kind, items: [], fetchedAt };
    }

    const [commits, releases] = await Promise.all([
      this.listCommits(owner, repo, signal),
      this.listReleases(owner, repo, signal),
    ]);

    const items: Item[] = [
      this.repositoryItem(repository, releases.length > 0),
      ...commits.map(commit => this.commitItem(commit)),
      ...releases.filter(release => !release.draft).map(release => this.releaseItem(release)),
    ];

    return { kind: 'items', source: this.kind, items, fetchedAt };
  }

  // ============================================================
  // API CALLS
  // ============================================================

  private async getRepository(owner: string, repo: string, signal: AbortSignal): Promise<RepositoryData | null> {
    try {
      const { data } = await this.octokit.rest.repos.get({ owner, repo, request: { signal } });
      return data;
    } catch (error) {
      if (statusOf(error) === 404) return null;
      throw error;
    }
  }

  private async listCommits(owner: string, repo: string, signal: AbortSignal): Promise<CommitData[]> {
    try {
      const { data } = await this.octokit.rest.repos.listCommits({
        owner,
        repo,
        per_page: this.options.maxItems,
        request: { signal },
      });
      return data;
    } catch (error) {
      // 409: the repository exists but has no commits yet
      if (statusOf(error) === 409) return [];
      throw error;
    }
  }

  private async listReleases(owner: string, repo: string, signal: AbortSignal): Promise<ReleaseData[]> {
    const { data } = await this.octokit.rest.repos.listReleases({
      owner,
      repo,
      per_page: this.options.maxItems,
      request: { signal },
    });
    return data;
  }

  // ============================================================
  // MAPPING
  // ============================================================

  private repositoryItem(repository: RepositoryData, hasReleases: boolean): Item {
    const description = repository.description ?? '';
    let releaseStage = detectReleaseStage(description);
    if (hasReleases) releaseStage = 'launched';
    // A fresh repository without releases is usually an announcement
    else if (releaseStage === 'unknown') releaseStage = 'announced';

    return {
      id: `repo:${repository.full_name.toLowerCase()}`,
      category: 'repository',
      fingerprint: repository.created_at,
      title: `Repository discovered: ${repository.full_name}`,
      description: description || undefined,
      url: repository.html_url,
      timestamp: repository.created_at,
      releaseStage,
      metadata: {
        stars: repository.stargazers_count,
        forks: repository.forks_count,
        language: repository.language ?? null,
      },
    };
  }

  private commitItem(commit: CommitData): Item {
    const message = commit.commit.message || 'No message';
    const author = commit.commit.author?.name ?? 'Unknown';

    return {
      id: commit.sha,
      category: 'commit',
      fingerprint: commit.sha,
      title: truncate(firstLine(message), 100),
      description: `Author: ${author}`,
      url: commit.html_url,
      timestamp: commit.commit.author?.date ?? commit.commit.committer?.date,
      releaseStage: detectReleaseStage(message),
      metadata: {
        sha: commit.sha.slice(0, 7),
        author,
      },
    };
  }

  private releaseItem(release: ReleaseData): Item {
    const text = `${release.name ?? ''} ${release.body ?? ''}`;
    const hasAssets = release.assets.length > 0 && !release.prerelease;
    const releaseStage = detectReleaseStage(text, { prerelease: release.prerelease, hasAssets });
    const label = release.prerelease ? 'Pre-release' : 'Release';

    return {
      id: `release:${release.id}`,
      category: 'release',
      fingerprint: `${release.tag_name}@${release.published_at ?? release.created_at}`,
      title: `${label}: ${release.tag_name}`,
      description: release.name || truncate(release.body ?? '', 200) || undefined,
      url: release.html_url,
      timestamp: release.published_at ?? release.created_at,
      releaseStage,
      metadata: {
        tag: release.tag_name,
        prerelease: release.prerelease,
        hasAssets: release.assets.length > 0,
      },
    };
  }
}
