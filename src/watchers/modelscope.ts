/**
 * Release Radar: ModelScope Watcher
 */

import { z } from 'zod';
import type { Item, ItemSnapshot, WatchTarget } from '../types';
import { SourceWatcher, truncate } from './base';

const API_BASE = 'https://modelscope.cn/api/v1';

const Timestamp = z.union([z.number(), z.string()]).nullable().optional();

const ModelResponseSchema = z.object({
  Code: z.number().optional(),
  Success: z.boolean().optional(),
  Data: z
    .object({
      Name: z.string().optional(),
      ChineseName: z.string().optional(),
      Description: z.string().nullable().optional(),
      ChineseDescription: z.string().nullable().optional(),
      Downloads: z.number().optional(),
      Likes: z.number().optional(),
      Task: z.string().nullable().optional(),
      LastModifiedTime: Timestamp,
      GmtModified: Timestamp,
      GmtCreate: Timestamp,
      CreatedTime: Timestamp,
    })
    .passthrough()
    .nullable()
    .optional(),
});

/**
 * ModelScope mixes epoch seconds, epoch milliseconds and ISO strings.
 */
export function toIsoTimestamp(value: number | string | null | undefined): string | undefined {
  if (value === null || value === undefined || value === '') return undefined;

  if (typeof value === 'number') {
    const ms = value < 1e12 ? value * 1000 : value;
    return new Date(ms).toISOString();
  }

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : new Date(parsed).toISOString();
}

export class ModelScopeWatcher extends SourceWatcher {
  readonly kind = 'modelscope' as const;

  async fetch(target: WatchTarget, signal: AbortSignal): Promise<ItemSnapshot> {
    const fetchedAt = new Date().toISOString();
    const empty: ItemSnapshot = { kind: 'items', source: this.kind, items: [], fetchedAt };

    const response = await this.httpGet(`${API_BASE}/models/${target.identifier}`, target, {
      signal,
      headers: { Accept: 'application/json' },
      accept: [404],
    });
    if (response.status === 404) return empty;

    const parsed = ModelResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw this.fail(`Unexpected ModelScope response for ${target.identifier}`, target);
    }

    const { Success, Code, Data } = parsed.data;
    // ModelScope answers 200 with Success=false for models that are not published
    if (!(Success || Code === 200) || !Data) return empty;

    const modified = Data.LastModifiedTime ?? Data.GmtModified;
    const description = Data.ChineseDescription || Data.Description || '';

    const item: Item = {
      id: target.identifier,
      category: 'model',
      fingerprint: modified === null || modified === undefined ? 'unknown' : String(modified),
      title: `Model: ${target.identifier}`,
      description: description ? truncate(description, 300) : undefined,
      url: `https://modelscope.cn/models/${target.identifier}`,
      timestamp: toIsoTimestamp(modified) ?? toIsoTimestamp(Data.GmtCreate ?? Data.CreatedTime),
      metadata: {
        downloads: Data.Downloads ?? 0,
        likes: Data.Likes ?? 0,
        task: Data.Task ?? null,
      },
    };

    return { ...empty, items: [item] };
  }
}
