/**
 * Release Radar: Diff Outcome
 *
 * Shared by both diff engines.
 */

import type { SourceKind, StatePayload, StateRecord, WatchEvent } from '../types';

export interface DiffOutcome {
  events: WatchEvent[];
  /** Record to commit once the events have been handed off */
  record: StateRecord;
  /** True when there was no usable previous record */
  baseline: boolean;
}

export type IdFactory = () => string;

/**
 * Next record for a pair. The payload is always replaced; fingerprint and
 * lastChangedAt only move on the first observation or when events fired.
 */
export function nextRecord(params: {
  entityKey: string;
  sourceKind: SourceKind;
  previous: StateRecord | null;
  payload: StatePayload;
  fingerprint: string;
  changed: boolean;
  now: string;
}): StateRecord {
  const { entityKey, sourceKind, previous, payload, fingerprint, changed, now } = params;

  if (!previous) {
    return {
      entityKey,
      sourceKind,
      fingerprint,
      payload,
      lastCheckedAt: now,
      lastChangedAt: changed ? now : null,
    };
  }

  return {
    entityKey,
    sourceKind,
    fingerprint: changed ? fingerprint : previous.fingerprint,
    payload,
    lastCheckedAt: now,
    lastChangedAt: changed ? now : previous.lastChangedAt,
  };
}
