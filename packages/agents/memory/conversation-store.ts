// Conversation stores: latest-state checkpoints and append-only run history
// Only ConversationPipeline reads or writes them.

import type { RunRecordBase } from '../types/pipeline.js';

export interface CheckpointStore<S> {
  /** Record a snapshot; it becomes the latest state for the conversation */
  put(conversationId: string, state: S): Promise<void>;
  latest(conversationId: string): Promise<S | null>;
  /** Every snapshot for the conversation, oldest first */
  history(conversationId: string): Promise<S[]>;
}

export interface RunRecordStore<R extends RunRecordBase> {
  append(conversationId: string, records: readonly R[]): Promise<void>;
  /** Insertion order; empty for unknown ids */
  list(conversationId: string): Promise<R[]>;
  /** Most recent record per conversation, `at` descending */
  latestPerConversation(): Promise<R[]>;
}

export function sortByAtDescending<R extends RunRecordBase>(records: R[]): R[] {
  return [...records].sort((a, b) => Date.parse(b.at) - Date.parse(a.at));
}

// In-memory implementations (default backend, lost on restart)

export class LocalCheckpointStore<S> implements CheckpointStore<S> {
  private snapshots = new Map<string, S[]>();

  async put(conversationId: string, state: S): Promise<void> {
    const copy = structuredClone(state);
    const existing = this.snapshots.get(conversationId);
    if (existing) {
      existing.push(copy);
    } else {
      this.snapshots.set(conversationId, [copy]);
    }
  }

  async latest(conversationId: string): Promise<S | null> {
    const snapshots = this.snapshots.get(conversationId);
    const last = snapshots?.[snapshots.length - 1];
    return last === undefined ? null : structuredClone(last);
  }

  async history(conversationId: string): Promise<S[]> {
    return (this.snapshots.get(conversationId) ?? []).map(s => structuredClone(s));
  }
}

export class LocalRunRecordStore<R extends RunRecordBase> implements RunRecordStore<R> {
  private records = new Map<string, R[]>();

  async append(conversationId: string, records: readonly R[]): Promise<void> {
    if (records.length === 0) return;
    const existing = this.records.get(conversationId) ?? [];
    this.records.set(conversationId, [...existing, ...records.map(r => structuredClone(r))]);
  }

  async list(conversationId: string): Promise<R[]> {
    return (this.records.get(conversationId) ?? []).map(r => structuredClone(r));
  }

  async latestPerConversation(): Promise<R[]> {
    const latest: R[] = [];
    for (const records of this.records.values()) {
      const last = records[records.length - 1];
      if (last) latest.push(structuredClone(last));
    }
    return sortByAtDescending(latest);
  }
}
