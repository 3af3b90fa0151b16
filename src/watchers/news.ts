/**
 * Release Radar: News Watcher
 *
 * Google News RSS search for the entity's keywords.
 */

import Parser from 'rss-parser';
import { z } from 'zod';
import type { Item, ItemSnapshot, WatchTarget } from '../types';
import { shortHash } from '../lib/hash';
import { SourceWatcher, truncate } from './base';

const MAX_ARTICLES = 15;

type NewsEntry = { source?: unknown };

// <source url="...">Publisher</source> arrives as a plain string or as { _: text, $: attrs }
const PublisherSchema = z.union([z.string(), z.object({ _: z.string() }).passthrough()]);

export function buildNewsSearchUrl(keywords: string): string {
  return `https://news.google.com/rss/search?q=${encodeURIComponent(keywords)}&hl=en-US&gl=US&ceid=US:en`;
}

/**
 * Google News appends " - Publisher" to every headline.
 */
export function stripPublisher(title: string): string {
  const cut = title.lastIndexOf(' - ');
  return cut > 0 ? title.slice(0, cut) : title;
}

function publisherOf(raw: unknown): string {
  const parsed = PublisherSchema.safeParse(raw);
  if (!parsed.success) return 'Unknown Source';
  return typeof parsed.data === 'string' ? parsed.data : parsed.data._;
}

export class NewsWatcher extends SourceWatcher {
  readonly kind = 'news' as const;

  private readonly parser = new Parser<Record<string, unknown>, NewsEntry>({
    customFields: { item: ['source'] },
  });

  async fetch(target: WatchTarget, signal: AbortSignal): Promise<ItemSnapshot> {
    const fetchedAt = new Date().toISOString();

    const response = await this.httpGet(buildNewsSearchUrl(target.identifier), target, { signal });
    const feed = await this.parser.parseString(await response.text());

    const items: Item[] = [];
    for (const entry of feed.items.slice(0, MAX_ARTICLES)) {
      if (!entry.link) continue;
      const publisher = publisherOf(entry.source);

      items.push({
        id: `news:${shortHash(entry.link)}`,
        category: 'article',
        fingerprint: entry.link,
        title: truncate(stripPublisher(entry.title ?? 'No title'), 150),
        description: `Source: ${publisher}`,
        url: entry.link,
        timestamp: entry.isoDate,
        metadata: { publisher },
      });
    }

    return { kind: 'items', source: this.kind, items, fetchedAt };
  }
}
