// Store factory: selects the conversation store backend (PIPELINE_STORE_BACKEND)
// Supported values: 'local' (default), 'postgres'

import type { CheckpointStore, RunRecordStore } from '../memory/conversation-store.js';
import type { RunRecordBase } from '../types/pipeline.js';
import type { StoreBackend } from './settings.js';

export interface ConversationStores<S, R extends RunRecordBase> {
  checkpoints: CheckpointStore<S>;
  runStore: RunRecordStore<R>;
}

/**
 * Create the checkpoint and run-record stores for one pipeline.
 * - `local`: in-process maps, lost on restart
 * - `postgres`: conversation_checkpoints / conversation_runs tables
 */
export async function createConversationStores<S, R extends RunRecordBase>(
  backend: StoreBackend,
  pipeline: string,
): Promise<ConversationStores<S, R>> {
  switch (backend) {
    case 'postgres': {
      const { PgCheckpointStore, PgRunRecordStore } = await import('../memory/pg-conversation-store.js');
      return {
        checkpoints: new PgCheckpointStore<S>(pipeline),
        runStore: new PgRunRecordStore<R>(pipeline),
      };
    }
    case 'local':
    default: {
      const { LocalCheckpointStore, LocalRunRecordStore } = await import('../memory/conversation-store.js');
      return {
        checkpoints: new LocalCheckpointStore<S>(),
        runStore: new LocalRunRecordStore<R>(),
      };
    }
  }
}
