/**
 * Release Radar: Watchers
 */

import type { Octokit } from 'octokit';
import type { WatcherConfig } from '../types';
import { WatcherRegistry, type WatcherOptions } from './base';
import { ArxivWatcher } from './arxiv';
import { GitHubWatcher, createOctokit } from './github';
import { HuggingFaceWatcher } from './huggingface';
import { LeaderboardWatcher } from './leaderboard';
import { ModelScopeWatcher } from './modelscope';
import { NewsWatcher } from './news';

export { SourceWatcher, WatcherRegistry, type FetchResult, type WatcherOptions } from './base';
export { GitHubWatcher, createOctokit } from './github';
export { HuggingFaceWatcher } from './huggingface';
export { ModelScopeWatcher } from './modelscope';
export { ArxivWatcher } from './arxiv';
export { NewsWatcher } from './news';
export { LeaderboardWatcher } from './leaderboard';

/**
 * Build one watcher per source kind from the resolved configuration.
 */
export function createWatchers(
  config: Pick<WatcherConfig, 'watcherTimeoutMs' | 'maxItemsPerFetch' | 'credentials'>,
  deps: { octokit?: Octokit } = {}
): WatcherRegistry {
  const options: WatcherOptions = {
    timeoutMs: config.watcherTimeoutMs,
    maxItems: config.maxItemsPerFetch,
  };
  const { githubToken, huggingfaceToken, artificialAnalysisApiKey } = config.credentials;

  return new WatcherRegistry()
    .register(new GitHubWatcher(options, deps.octokit ?? createOctokit(githubToken)))
    .register(new HuggingFaceWatcher(options, huggingfaceToken))
    .register(new ModelScopeWatcher(options))
    .register(new ArxivWatcher(options))
    .register(new NewsWatcher(options))
    .register(new LeaderboardWatcher(options, artificialAnalysisApiKey));
}
