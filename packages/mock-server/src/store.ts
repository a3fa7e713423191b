/**
 * In-Memory Revision Store
 *
 * Every write is an ADD or REMOVE revision stamped with a microsecond
 * timestamp. The state at any instant is the replay of the revisions up to
 * it, so historical reads need nothing beyond the log itself.
 */

import type { TObject } from '@chronokv/client';

import type { Clock } from './clock.js';

// ============================================================================
// Types
// ============================================================================

export type Action = 'ADD' | 'REMOVE';

/** A write that has not been stamped yet, e.g. one buffered in a transaction. */
export interface Write {
  readonly action: Action;
  readonly key: string;
  readonly value: TObject;
  readonly record: number;
}

export interface Revision extends Write {
  readonly timestamp: number;
}

/** Read-only view of the data at one point in time. */
export interface Snapshot {
  values(record: number, key: string): TObject[];
  keys(record: number): string[];
  records(): number[];
}

export function sameValue(a: TObject, b: TObject): boolean {
  return a.type === b.type && a.data === b.data;
}

/** "ADD name AS Ada IN 1" */
export function describeRevision(revision: Write): string {
  return `${revision.action} ${revision.key} AS ${revision.value.data} IN ${revision.record}`;
}

// ============================================================================
// Replay
// ============================================================================

type State = Map<number, Map<string, TObject[]>>;

function apply(state: State, write: Write): void {
  let fields = state.get(write.record);
  if (!fields) {
    fields = new Map();
    state.set(write.record, fields);
  }
  const current = fields.get(write.key) ?? [];
  if (write.action === 'ADD') {
    if (!current.some((value) => sameValue(value, write.value))) {
      fields.set(write.key, [...current, write.value]);
    }
  } else {
    const remaining = current.filter((value) => !sameValue(value, write.value));
    if (remaining.length > 0) {
      fields.set(write.key, remaining);
    } else {
      fields.delete(write.key);
    }
  }
}

class ReplayedSnapshot implements Snapshot {
  private readonly state: State = new Map();

  constructor(writes: Iterable<Write>) {
    for (const write of writes) {
      apply(this.state, write);
    }
  }

  values(record: number, key: string): TObject[] {
    return [...(this.state.get(record)?.get(key) ?? [])];
  }

  keys(record: number): string[] {
    return [...(this.state.get(record)?.keys() ?? [])].sort();
  }

  records(): number[] {
    return [...this.state.entries()]
      .filter(([, fields]) => fields.size > 0)
      .map(([record]) => record)
      .sort((a, b) => a - b);
  }
}

// ============================================================================
// Store
// ============================================================================

export class RevisionStore {
  private readonly revisions: Revision[] = [];
  private nextRecord = 1;

  constructor(private readonly clock: Clock) {}

  now(): number {
    return this.clock();
  }

  /** Reserve a record id no other write has used. */
  allocateRecord(): number {
    const record = this.nextRecord;
    this.nextRecord += 1;
    return record;
  }

  append(write: Write): Revision {
    const revision: Revision = { ...write, timestamp: this.clock() };
    this.revisions.push(revision);
    if (write.record >= this.nextRecord) {
      this.nextRecord = write.record + 1;
    }
    return revision;
  }

  /**
   * State as of `at` (inclusive), or the present when omitted. `pending`
   * writes are replayed on top of the present state only.
   */
  snapshot(at?: number, pending: readonly Write[] = []): Snapshot {
    if (at !== undefined) {
      return new ReplayedSnapshot(this.revisions.filter((revision) => revision.timestamp <= at));
    }
    return new ReplayedSnapshot([...this.revisions, ...pending]);
  }

  /**
   * Revisions to a record, optionally one key, with `start <= timestamp < end`.
   */
  audit(record: number, key?: string, start?: number, end?: number): Revision[] {
    return this.revisions.filter(
      (revision) =>
        revision.record === record &&
        (key === undefined || revision.key === key) &&
        (start === undefined || revision.timestamp >= start) &&
        (end === undefined || revision.timestamp < end),
    );
  }

  /** Timestamp of the latest revision to a record, or undefined if it was never written. */
  lastChange(record: number): number | undefined {
    for (let i = this.revisions.length - 1; i >= 0; i--) {
      const revision = this.revisions[i];
      if (revision !== undefined && revision.record === record) {
        return revision.timestamp;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.revisions.length;
  }
}
