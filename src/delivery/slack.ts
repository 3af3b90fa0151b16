/**
 * Release Radar: Slack Delivery
 *
 * Sends one message per routed event using webhooks or the Bot API.
 * Supports Block Kit for rich formatting. With nothing configured,
 * messages are printed to the console instead.
 */

import { z } from 'zod';
import type { DeliveryResult, EventKind, Notifier, SlackSettings, SourceKind, WatchEvent } from '../types';
import { DeliveryError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface SlackMessage {
  channel?: string;
  text: string;
  blocks?: SlackBlock[];
  attachments?: SlackAttachment[];
  unfurl_links?: boolean;
  unfurl_media?: boolean;
}

export interface SlackBlock {
  type: string;
  text?: SlackText;
  elements?: Array<SlackElement | SlackText>;
  fields?: SlackText[];
}

export interface SlackText {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

export interface SlackElement {
  type: string;
  text?: SlackText;
  url?: string;
  action_id?: string;
  style?: string;
}

export interface SlackAttachment {
  color?: string;
  fallback?: string;
  blocks?: SlackBlock[];
}

export interface MessageFormat {
  includeIcons: boolean;
  includeTimestamp: boolean;
}

const BotApiResponseSchema = z.object({
  ok: z.boolean(),
  channel: z.string().optional(),
  ts: z.string().optional(),
  error: z.string().optional(),
});

// ============================================================
// PRESENTATION
// ============================================================

const SOURCE_STYLE: Record<SourceKind, { icon: string; color: string }> = {
  github: { icon: ':octocat:', color: '#24292e' },
  huggingface: { icon: ':hugging_face:', color: '#ffcc00' },
  modelscope: { icon: ':microscope:', color: '#1890ff' },
  arxiv: { icon: ':page_facing_up:', color: '#b31b1b' },
  news: { icon: ':newspaper:', color: '#4a90d9' },
  leaderboard: { icon: ':trophy:', color: '#ffd700' },
};

const EVENT_LABELS: Record<EventKind, string> = {
  repo_created: 'New Repository',
  new_commit: 'New Commit',
  new_release: 'New Release',
  new_model: 'New Model',
  model_update: 'Model Updated',
  new_paper: 'New Paper',
  news_article: 'News Article',
  leaderboard_new_entry: 'Leaderboard: New Entry',
  leaderboard_rank_change: 'Leaderboard: Rank Change',
  leaderboard_top3_change: 'Leaderboard: Top 3 Change',
};

// Slack rejects header blocks over 150 characters
const HEADER_LIMIT = 150;
const PLACEHOLDER_WEBHOOK = 'https://hooks.slack.com/services/YOUR';

// ============================================================
// BLOCK BUILDERS
// ============================================================

function header(text: string): SlackBlock {
  return {
    type: 'header',
    text: { type: 'plain_text', text: text.slice(0, HEADER_LIMIT), emoji: true },
  };
}

function section(text: string): SlackBlock {
  return {
    type: 'section',
    text: { type: 'mrkdwn', text },
  };
}

function context(texts: string[]): SlackBlock {
  return {
    type: 'context',
    elements: texts.map(t => ({ type: 'mrkdwn', text: t })),
  };
}

function actions(buttons: Array<{ text: string; url: string; style?: string }>): SlackBlock {
  return {
    type: 'actions',
    elements: buttons.map((b, i) => ({
      type: 'button',
      text: { type: 'plain_text', text: b.text, emoji: true },
      url: b.url,
      action_id: `button-${i}`,
      style: b.style,
    })),
  };
}

// ============================================================
// EVENT MESSAGE
// ============================================================

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

export function formatUtc(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

/**
 * Event-specific detail line, or null when the title says it all.
 */
export function describeEvent(event: WatchEvent): string | null {
  switch (event.kind) {
    case 'leaderboard_new_entry': {
      const creator = event.entry.creator ? ` | Creator: ${event.entry.creator}` : '';
      return `Board: ${event.board} | Rank: #${event.entry.rank} | ELO: ${event.entry.score}${creator}`;
    }
    case 'leaderboard_rank_change': {
      const arrow = event.delta > 0 ? ':arrow_up:' : ':arrow_down:';
      const scoreDiff = Math.round(event.currentScore - event.previousScore);
      return (
        `Board: ${event.board} | Rank: #${event.previousRank} → #${event.currentRank} (${arrow} ${signed(event.delta)})` +
        ` | ELO: ${event.previousScore} → ${event.currentScore} (${signed(scoreDiff)})`
      );
    }
    case 'leaderboard_top3_change': {
      const top = event.currentTop3.map(e => `#${e.rank} ${e.name}`).join(', ');
      const names = new Map([...event.previousTop3, ...event.currentTop3].map(e => [e.itemId, e.name]));
      const nameOf = (id: string): string => names.get(id) ?? id;
      const moves = [
        event.entered.length > 0 ? `Entered: ${event.entered.map(nameOf).join(', ')}` : null,
        event.exited.length > 0 ? `Exited: ${event.exited.map(nameOf).join(', ')}` : null,
      ].filter((part): part is string => part !== null);
      return [`Board: ${event.board} | New Top 3: ${top}`, ...moves].join('\n');
    }
    case 'model_update':
      return event.previousFingerprint
        ? `Revision: ${event.previousFingerprint.slice(0, 12)} → ${event.item.fingerprint.slice(0, 12)}`
        : null;
    default:
      return null;
  }
}

export function buildEventMessage(
  event: WatchEvent,
  options: MessageFormat & { mention: boolean; priority: boolean }
): SlackMessage {
  const style = SOURCE_STYLE[event.source];
  let title = `${EVENT_LABELS[event.kind]}: ${event.subject}`;
  if (options.includeIcons) title = `${style.icon} ${title}`;
  if (options.priority) title = `:star: ${title}`;

  const body = [`*${event.item.title}*`];
  if (event.item.description) body.push(event.item.description.slice(0, 500));
  if (event.item.releaseStage && event.item.releaseStage !== 'unknown') {
    body.push(`_Stage: ${event.item.releaseStage}_`);
  }

  const blocks: SlackBlock[] = [header(title), section(body.join('\n'))];

  const detail = describeEvent(event);
  if (detail) blocks.push(section(detail));

  if (event.item.url) {
    blocks.push(actions([{ text: 'View Details', url: event.item.url }]));
  }

  if (options.includeTimestamp) {
    const when = event.item.category === 'ranked_entry' ? event.detectedAt : event.item.timestamp ?? event.detectedAt;
    blocks.push(context([`Source: ${event.source.toUpperCase()} | ${formatUtc(when)}`]));
  }

  return {
    text: `${options.mention ? '<!channel> ' : ''}${title}`,
    attachments: [{ color: style.color, fallback: title, blocks }],
    unfurl_links: false,
  };
}

// ============================================================
// NOTIFIER
// ============================================================

export class SlackNotifier implements Notifier {
  private readonly log = logger.child({ component: 'SlackNotifier' });

  constructor(
    private readonly settings: SlackSettings,
    private readonly format: MessageFormat = { includeIcons: true, includeTimestamp: true }
  ) {}

  /** True when messages actually leave the process. */
  get configured(): boolean {
    return Boolean(this.settings.botToken) || this.webhookUrls().length > 0;
  }

  async deliver(event: WatchEvent, channel: string, mention: boolean, priority = false): Promise<DeliveryResult> {
    const message = buildEventMessage(event, { ...this.format, mention, priority });
    return this.send(channel, message);
  }

  /**
   * Send a connectivity message to every configured destination.
   */
  async testConnection(): Promise<DeliveryResult[]> {
    const message: SlackMessage = {
      text: ':white_check_mark: Release Radar connected successfully!',
      blocks: [section('*Release Radar* is now connected and monitoring for updates.')],
    };

    if (this.settings.botToken) {
      const channels = Object.keys(this.settings.channels);
      return Promise.all(channels.map(channel => this.send(channel, message)));
    }

    const targets = new Map<string, string>();
    if (this.isUsable(this.settings.webhookUrl)) targets.set('default', this.settings.webhookUrl);
    for (const [channel, url] of Object.entries(this.settings.channels)) {
      if (this.isUsable(url) && ![...targets.values()].includes(url)) targets.set(channel, url);
    }

    const results: DeliveryResult[] = [];
    for (const [channel, url] of targets) {
      results.push(await this.attempt(channel, () => this.sendViaWebhook(url, channel, message)));
    }
    return results;
  }

  // ============================================================
  // SEND FUNCTIONS
  // ============================================================

  private async send(channel: string, message: SlackMessage): Promise<DeliveryResult> {
    if (this.settings.botToken) {
      const slackChannel = this.settings.channels[channel] ?? channel;
      return this.attempt(channel, () => this.sendViaBotApi(slackChannel, channel, message));
    }

    const webhookUrl = this.webhookFor(channel);
    if (webhookUrl) {
      return this.attempt(channel, () => this.sendViaWebhook(webhookUrl, channel, message));
    }

    // Console fallback
    console.log('='.repeat(60));
    console.log(`SLACK MESSAGE (Console Fallback) #${channel}`);
    console.log('='.repeat(60));
    console.log(JSON.stringify(message, null, 2));
    console.log('='.repeat(60));

    return { success: true, channel, sentAt: new Date().toISOString() };
  }

  private async attempt(channel: string, send: () => Promise<void>): Promise<DeliveryResult> {
    try {
      await send();
      this.log.debug('Slack message sent', { channel });
      return { success: true, channel, sentAt: new Date().toISOString() };
    } catch (error) {
      const errorMsg = describeError(error);
      this.log.error('Slack send failed', { channel, error: errorMsg });
      return { success: false, channel, error: errorMsg, sentAt: new Date().toISOString() };
    }
  }

  /**
   * Send message via webhook.
   */
  private async sendViaWebhook(url: string, channel: string, message: SlackMessage): Promise<void> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(message),
      });
    } catch (error) {
      throw new DeliveryError(`Slack webhook unreachable: ${describeError(error)}`, { channel, cause: error });
    }

    if (!res.ok) {
      const error = await res.text();
      throw new DeliveryError(`Slack webhook error: ${res.status} - ${error}`, { channel, status: res.status });
    }
  }

  /**
   * Send message via Bot API.
   */
  private async sendViaBotApi(slackChannel: string, channel: string, message: SlackMessage): Promise<void> {
    let res: Response;
    try {
      res = await fetch('https://slack.com/api/chat.postMessage', {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.settings.botToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          ...message,
          channel: slackChannel,
          unfurl_links: message.unfurl_links ?? false,
          unfurl_media: message.unfurl_media ?? false,
        }),
      });
    } catch (error) {
      throw new DeliveryError(`Slack API unreachable: ${describeError(error)}`, { channel, cause: error });
    }

    const data = BotApiResponseSchema.safeParse(await res.json());
    if (!data.success) {
      throw new DeliveryError(`Slack API returned an unexpected body (${res.status})`, { channel, status: res.status });
    }
    if (!data.data.ok) {
      throw new DeliveryError(`Slack API error: ${data.data.error ?? 'unknown'}`, { channel, status: res.status });
    }
  }

  private webhookFor(channel: string): string | undefined {
    const routed = this.settings.channels[channel];
    if (this.isUsable(routed)) return routed;
    return this.isUsable(this.settings.webhookUrl) ? this.settings.webhookUrl : undefined;
  }

  private webhookUrls(): string[] {
    return [this.settings.webhookUrl, ...Object.values(this.settings.channels)].filter(
      (url): url is string => this.isUsable(url)
    );
  }

  private isUsable(url: string | undefined): url is string {
    return Boolean(url) && !url?.startsWith(PLACEHOLDER_WEBHOOK);
  }
}
