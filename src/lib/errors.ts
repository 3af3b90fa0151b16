/**
 * Release Radar: Error Taxonomy
 *
 * FetchError, PersistenceError and DeliveryError are scoped to one
 * (entity, source) pair and never abort a sweep. ConfigError is fatal at startup.
 */

import type { SourceKind } from '../types';

export type WatcherErrorCode = 'FETCH' | 'PERSISTENCE' | 'DELIVERY' | 'CONFIG';

export abstract class WatcherError extends Error {
  abstract readonly code: WatcherErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends WatcherError {
  readonly code = 'FETCH' as const;
  readonly source: SourceKind;
  readonly entityKey: string;
  readonly status?: number;

  constructor(
    message: string,
    details: { source: SourceKind; entityKey: string; status?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.source = details.source;
    this.entityKey = details.entityKey;
    this.status = details.status;
  }

  /** Rate limits and server errors clear up on their own; 4xx other than 429 usually do not. */
  get retryable(): boolean {
    if (this.status === undefined) return true;
    return this.status === 429 || this.status >= 500;
  }
}

export type PersistenceOperation = 'get' | 'put' | 'reset' | 'list' | 'open';

export class PersistenceError extends WatcherError {
  readonly code = 'PERSISTENCE' as const;
  readonly operation: PersistenceOperation;
  readonly entityKey?: string;

  constructor(
    message: string,
    details: { operation: PersistenceOperation; entityKey?: string; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.operation = details.operation;
    this.entityKey = details.entityKey;
  }
}

export class DeliveryError extends WatcherError {
  readonly code = 'DELIVERY' as const;
  readonly channel: string;
  readonly status?: number;

  constructor(message: string, details: { channel: string; status?: number; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.channel = details.channel;
    this.status = details.status;
  }
}

export class ConfigError extends WatcherError {
  readonly code = 'CONFIG' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pull an HTTP status off errors thrown by Octokit and similar clients.
 */
export function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
