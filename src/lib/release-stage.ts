/**
 * Release Radar: Release Stage Detection
 *
 * Tells an announcement ("coming soon", pre-release) apart from an
 * actual launch ("weights released", stable tag) using keywords.
 */

import type { ReleaseStage } from '../types';

const ANNOUNCEMENT_KEYWORDS = [
  'coming soon',
  'announcing',
  'preview',
  'teaser',
  'upcoming',
  'will be released',
  'stay tuned',
  'sneak peek',
  'roadmap',
  'planned',
  'expected',
  'eta',
  'wip',
  'work in progress',
  'alpha',
  'beta',
  'rc',
  'release candidate',
  'pre-release',
] as const;

const LAUNCH_KEYWORDS = [
  'released',
  'available now',
  'v1.',
  'v2.',
  'stable',
  'production ready',
  'ready to use',
  'download now',
  'pip install',
  'weights released',
] as const;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Short keywords like "rc" or "eta" must not match inside "source" or "beta".
function keywordPattern(keyword: string): RegExp {
  const tail = /[a-z0-9]$/.test(keyword) ? '(?![a-z0-9])' : '';
  return new RegExp(`(?<![a-z0-9])${escapeRegex(keyword)}${tail}`);
}

const ANNOUNCEMENT_PATTERNS = ANNOUNCEMENT_KEYWORDS.map(keywordPattern);
const LAUNCH_PATTERNS = LAUNCH_KEYWORDS.map(keywordPattern);

export interface StageHints {
  prerelease?: boolean;
  hasAssets?: boolean;
}

export function detectReleaseStage(text: string | null | undefined, hints: StageHints = {}): ReleaseStage {
  if (hints.prerelease) return 'announced';
  if (hints.hasAssets) return 'launched';
  if (!text) return 'unknown';

  const lower = text.toLowerCase();

  if (ANNOUNCEMENT_PATTERNS.some(p => p.test(lower))) return 'announced';
  if (LAUNCH_PATTERNS.some(p => p.test(lower))) return 'launched';

  return 'unknown';
}
