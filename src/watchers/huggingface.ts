/**
 * Release Radar: Hugging Face Hub Watcher
 *
 * One model per pair. The fingerprint is the repo revision, so pushing
 * new weights shows up as `model_update`. The latest commits on `main`
 * come along as commit items.
 */

import { z } from 'zod';
import type { Item, ItemSnapshot, WatchTarget } from '../types';
import { SourceWatcher, truncate, type WatcherOptions } from './base';

const API_BASE = 'https://huggingface.co/api';

const ModelInfoSchema = z.object({
  id: z.string().optional(),
  modelId: z.string().optional(),
  sha: z.string().optional(),
  lastModified: z.string().optional(),
  createdAt: z.string().optional(),
  downloads: z.number().optional(),
  likes: z.number().optional(),
  pipeline_tag: z.string().nullable().optional(),
  library_name: z.string().nullable().optional(),
  tags: z.array(z.string()).optional(),
  cardData: z.object({ description: z.string().optional() }).passthrough().nullable().optional(),
});
type ModelInfo = z.infer<typeof ModelInfoSchema>;

const CommitListSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string().optional(),
    date: z.string().optional(),
    authors: z.array(z.object({ user: z.string() })).optional(),
  })
);
type HubCommit = z.infer<typeof CommitListSchema>[number];

export class HuggingFaceWatcher extends SourceWatcher {
  readonly kind = 'huggingface' as const;

  constructor(
    options: WatcherOptions,
    private readonly token?: string
  ) {
    super(options);
  }

  async fetch(target: WatchTarget, signal: AbortSignal): Promise<ItemSnapshot> {
    const fetchedAt = new Date().toISOString();
    const headers: Record<string, string> = {};
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    // Gated or not-yet-public models answer 401; both mean "not there yet"
    const response = await this.httpGet(`${API_BASE}/models/${target.identifier}`, target, {
      signal,
      headers,
      accept: [401, 404],
    });

    if (response.status === 401 || response.status === 404) {
      return { kind: 'items', source: this.kind, items: [], fetchedAt };
    }

    const parsed = ModelInfoSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw this.fail(`Unexpected model info for ${target.identifier}`, target);
    }

    const model = this.modelItem(parsed.data, target.identifier);
    const commits = await this.fetchCommits(model.id, target, signal, headers);

    return {
      kind: 'items',
      source: this.kind,
      items: [model, ...commits],
      fetchedAt,
    };
  }

  private async fetchCommits(
    modelId: string,
    target: WatchTarget,
    signal: AbortSignal,
    headers: Record<string, string>
  ): Promise<Item[]> {
    const response = await this.httpGet(`${API_BASE}/models/${modelId}/commits/main`, target, { signal, headers });

    const parsed = CommitListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw this.fail(`Unexpected commit list for ${modelId}`, target);
    }

    return parsed.data.slice(0, this.options.maxItems).map(commit => this.commitItem(commit, modelId));
  }

  private commitItem(commit: HubCommit, modelId: string): Item {
    const item: Item = {
      id: commit.id,
      category: 'commit',
      fingerprint: commit.id,
      title: truncate(commit.title ?? 'Update', 100),
      description: `Author: ${commit.authors?.[0]?.user ?? 'Unknown'}`,
      url: `https://huggingface.co/${modelId}/commit/${commit.id}`,
      metadata: { commitId: commit.id.slice(0, 7) },
    };
    if (commit.date) item.timestamp = commit.date;
    return item;
  }

  private modelItem(model: ModelInfo, identifier: string): Item {
    const id = model.id ?? model.modelId ?? identifier;
    const description = model.cardData?.description ?? `Pipeline: ${model.pipeline_tag ?? 'N/A'}`;

    return {
      id,
      category: 'model',
      fingerprint: model.sha ?? model.lastModified ?? 'unknown',
      title: `Model: ${id}`,
      description: truncate(description, 300),
      url: `https://huggingface.co/${id}`,
      timestamp: model.lastModified ?? model.createdAt,
      metadata: {
        downloads: model.downloads ?? 0,
        likes: model.likes ?? 0,
        pipelineTag: model.pipeline_tag ?? null,
        library: model.library_name ?? null,
        tags: (model.tags ?? []).slice(0, 5),
      },
    };
  }
}
