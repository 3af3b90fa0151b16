/**
 * Release Radar: arXiv Watcher
 *
 * Queries the arXiv Atom API for the newest papers matching a phrase.
 * Papers are keyed by their arXiv id without the version suffix, so a
 * revised v2 of a known paper does not count as a new paper.
 */

import Parser from 'rss-parser';
import type { Item, ItemSnapshot, WatchTarget } from '../types';
import { SourceWatcher, collapseWhitespace, truncate } from './base';

const API_BASE = 'https://export.arxiv.org/api/query';

type ArxivEntry = { id?: string; author?: string; summary?: string };

/**
 * "http://arxiv.org/abs/2401.01234v2" -> { base: "2401.01234", versioned: "2401.01234v2" }
 */
export function parseArxivId(raw: string): { base: string; versioned: string } {
  const versioned = raw.includes('/abs/') ? raw.slice(raw.indexOf('/abs/') + 5) : raw;
  return { base: versioned.replace(/v\d+$/, ''), versioned };
}

export function buildArxivQueryUrl(phrase: string, maxResults: number): string {
  const params = new URLSearchParams({
    search_query: `all:"${phrase}"`,
    start: '0',
    max_results: String(maxResults),
    sortBy: 'submittedDate',
    sortOrder: 'descending',
  });
  return `${API_BASE}?${params.toString()}`;
}

export class ArxivWatcher extends SourceWatcher {
  readonly kind = 'arxiv' as const;

  private readonly parser = new Parser<Record<string, unknown>, ArxivEntry>();

  async fetch(target: WatchTarget, signal: AbortSignal): Promise<ItemSnapshot> {
    const fetchedAt = new Date().toISOString();
    const url = buildArxivQueryUrl(target.identifier, this.options.maxItems);

    const response = await this.httpGet(url, target, { signal });
    const feed = await this.parser.parseString(await response.text());

    const items: Item[] = [];
    for (const entry of feed.items) {
      const rawId = entry.id ?? entry.link;
      if (!rawId) continue;

      const { base, versioned } = parseArxivId(rawId);
      const summary = collapseWhitespace(entry.summary ?? entry.contentSnippet ?? '');

      items.push({
        id: `arxiv:${base}`,
        category: 'paper',
        fingerprint: versioned,
        title: collapseWhitespace(entry.title ?? 'No title'),
        description: summary ? truncate(summary, 400) : undefined,
        url: entry.link ?? `https://arxiv.org/abs/${base}`,
        timestamp: entry.isoDate,
        metadata: {
          arxivId: versioned,
          authors: entry.author ? [entry.author] : [],
        },
      });
    }

    return { kind: 'items', source: this.kind, items, fetchedAt };
  }
}
