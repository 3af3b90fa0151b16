/**
 * Release Radar: Event Router
 *
 * Decides where an event goes and how loudly. Pure and deterministic:
 * the same configuration and event always give the same route.
 */

import type {
  EventKind,
  NotificationConfig,
  PriorityModelConfig,
  RoutedEvent,
  WatchedEntity,
  WatchEvent,
} from '../types';

export interface RoutingTable {
  notifications: NotificationConfig;
  priorityModels: PriorityModelConfig[];
  entities: WatchedEntity[];
}

function normalize(name: string): string {
  return name.trim().toLowerCase();
}

export class EventRouter {
  private readonly mentionKinds: ReadonlySet<EventKind>;
  private readonly priorityModels = new Map<string, PriorityModelConfig>();
  private readonly entities = new Map<string, WatchedEntity>();

  constructor(private readonly table: RoutingTable) {
    this.mentionKinds = new Set(table.notifications.mentionChannelFor);
    for (const model of table.priorityModels) {
      this.priorityModels.set(normalize(model.name), model);
    }
    for (const entity of table.entities) {
      this.entities.set(normalize(entity.name), entity);
    }
  }

  route(event: WatchEvent): RoutedEvent {
    return {
      event,
      channel: this.channelFor(event),
      mentionChannel: this.shouldMention(event),
      priority: this.isPriority(event),
    };
  }

  /**
   * event_routing[kind], then [release stage], then [source], then the default.
   */
  channelFor(event: WatchEvent): string {
    const routing = this.table.notifications.eventRouting;
    const stage = event.item.releaseStage;

    const byKind = routing[event.kind];
    if (byKind) return byKind;

    if (stage && stage !== 'unknown') {
      const byStage = routing[stage];
      if (byStage) return byStage;
    }

    return routing[event.source] ?? this.table.notifications.defaultChannel;
  }

  shouldMention(event: WatchEvent): boolean {
    if (this.mentionKinds.has(event.kind)) return true;

    const priority = this.priorityModels.get(normalize(event.subject));
    if (priority?.mentionChannel) return true;

    const entity = this.entities.get(normalize(event.entityName));
    return entity?.alwaysNotify.includes(event.kind) ?? false;
  }

  isPriority(event: WatchEvent): boolean {
    const subject = normalize(event.subject);
    if (this.priorityModels.has(subject)) return true;
    return this.entities.get(subject)?.priority === 'high';
  }
}
