// Postgres-backed conversation stores
// Checkpoints and run records are JSONB rows, partitioned by pipeline name.

import { queryWithRetry } from '../db/pg-client.js';
import type { RunRecordBase } from '../types/pipeline.js';
import type { CheckpointStore, RunRecordStore } from './conversation-store.js';

export class PgCheckpointStore<S> implements CheckpointStore<S> {
  constructor(private readonly pipeline: string) {}

  async put(conversationId: string, state: S): Promise<void> {
    await queryWithRetry(
      `INSERT INTO conversation_checkpoints (pipeline, conversation_id, state)
       VALUES ($1, $2, $3::jsonb)`,
      [this.pipeline, conversationId, JSON.stringify(state)],
    );
  }

  async latest(conversationId: string): Promise<S | null> {
    const { rows } = await queryWithRetry<{ state: S }>(
      `SELECT state FROM conversation_checkpoints
        WHERE pipeline = $1 AND conversation_id = $2
        ORDER BY id DESC
        LIMIT 1`,
      [this.pipeline, conversationId],
    );
    return rows[0]?.state ?? null;
  }

  async history(conversationId: string): Promise<S[]> {
    const { rows } = await queryWithRetry<{ state: S }>(
      `SELECT state FROM conversation_checkpoints
        WHERE pipeline = $1 AND conversation_id = $2
        ORDER BY id ASC`,
      [this.pipeline, conversationId],
    );
    return rows.map(r => r.state);
  }
}

export class PgRunRecordStore<R extends RunRecordBase> implements RunRecordStore<R> {
  constructor(private readonly pipeline: string) {}

  async append(conversationId: string, records: readonly R[]): Promise<void> {
    for (const record of records) {
      await queryWithRetry(
        `INSERT INTO conversation_runs (pipeline, conversation_id, at, record)
         VALUES ($1, $2, $3, $4::jsonb)`,
        [this.pipeline, conversationId, record.at, JSON.stringify(record)],
      );
    }
  }

  async list(conversationId: string): Promise<R[]> {
    const { rows } = await queryWithRetry<{ record: R }>(
      `SELECT record FROM conversation_runs
        WHERE pipeline = $1 AND conversation_id = $2
        ORDER BY id ASC`,
      [this.pipeline, conversationId],
    );
    return rows.map(r => r.record);
  }

  async latestPerConversation(): Promise<R[]> {
    const { rows } = await queryWithRetry<{ record: R }>(
      `SELECT record FROM (
         SELECT DISTINCT ON (conversation_id) conversation_id, at, id, record
           FROM conversation_runs
          WHERE pipeline = $1
          ORDER BY conversation_id, id DESC
       ) latest
       ORDER BY at DESC, id ASC`,
      [this.pipeline],
    );
    return rows.map(r => r.record);
  }
}
