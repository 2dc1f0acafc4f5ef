import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { RunRecordBase } from '../types/pipeline.js';

// Mock the pg client so no database is needed
const { mockQuery } = vi.hoisted(() => ({ mockQuery: vi.fn() }));

vi.mock('../db/pg-client.js', () => ({
  queryWithRetry: mockQuery,
  toVectorLiteral: vi.fn((vec: readonly number[]) => `[${vec.join(',')}]`),
}));

interface Note extends RunRecordBase {
  note: string;
}

describe('PgCheckpointStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('put() inserts the state as JSON scoped to the pipeline', async () => {
    const { PgCheckpointStore } = await import('../memory/pg-conversation-store.js');
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const store = new PgCheckpointStore<{ step: number }>('finance');

    await store.put('conv-1', { step: 2 });

    expect(mockQuery).toHaveBeenCalledOnce();
    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('INSERT INTO conversation_checkpoints');
    expect(params).toEqual(['finance', 'conv-1', '{"step":2}']);
  });

  it('latest() returns the newest state or null', async () => {
    const { PgCheckpointStore } = await import('../memory/pg-conversation-store.js');
    const store = new PgCheckpointStore<{ step: number }>('finance');

    mockQuery.mockResolvedValueOnce({ rows: [{ state: { step: 3 } }] });
    expect(await store.latest('conv-1')).toEqual({ step: 3 });
    expect(mockQuery.mock.calls[0][0]).toContain('ORDER BY id DESC');

    mockQuery.mockResolvedValueOnce({ rows: [] });
    expect(await store.latest('conv-missing')).toBeNull();
  });

  it('history() returns states oldest first', async () => {
    const { PgCheckpointStore } = await import('../memory/pg-conversation-store.js');
    const store = new PgCheckpointStore<{ step: number }>('call');
    mockQuery.mockResolvedValueOnce({ rows: [{ state: { step: 1 } }, { state: { step: 2 } }] });

    expect(await store.history('conv-1')).toEqual([{ step: 1 }, { step: 2 }]);
    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('ORDER BY id ASC');
    expect(params).toEqual(['call', 'conv-1']);
  });
});

describe('PgRunRecordStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('append() inserts one row per record', async () => {
    const { PgRunRecordStore } = await import('../memory/pg-conversation-store.js');
    mockQuery.mockResolvedValue({ rows: [], rowCount: 1 });
    const store = new PgRunRecordStore<Note>('finance');
    const records: Note[] = [
      { at: '2024-05-01T10:00:00.000Z', conversationId: 'conv-1', note: 'a' },
      { at: '2024-05-01T10:01:00.000Z', conversationId: 'conv-1', note: 'b' },
    ];

    await store.append('conv-1', records);

    expect(mockQuery).toHaveBeenCalledTimes(2);
    const [sql, params] = mockQuery.mock.calls[1];
    expect(sql).toContain('INSERT INTO conversation_runs');
    expect(params).toEqual(['finance', 'conv-1', '2024-05-01T10:01:00.000Z', JSON.stringify(records[1])]);
  });

  it('append() with no records issues no query', async () => {
    const { PgRunRecordStore } = await import('../memory/pg-conversation-store.js');
    const store = new PgRunRecordStore<Note>('finance');
    await store.append('conv-1', []);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it('list() and latestPerConversation() unwrap the record column', async () => {
    const { PgRunRecordStore } = await import('../memory/pg-conversation-store.js');
    const store = new PgRunRecordStore<Note>('finance');
    const record: Note = { at: '2024-05-01T10:00:00.000Z', conversationId: 'conv-1', note: 'a' };

    mockQuery.mockResolvedValueOnce({ rows: [{ record }] });
    expect(await store.list('conv-1')).toEqual([record]);

    mockQuery.mockResolvedValueOnce({ rows: [{ record }] });
    expect(await store.latestPerConversation()).toEqual([record]);
    const [sql, params] = mockQuery.mock.calls[1];
    expect(sql).toContain('DISTINCT ON (conversation_id)');
    expect(params).toEqual(['finance']);
  });
});

describe('PgVectorIndex', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('query() maps rows to hits with numeric similarity', async () => {
    const { PgVectorIndex } = await import('../db/vector-index.js');
    mockQuery.mockResolvedValueOnce({
      rows: [{ id: 'seed-1', title: 'T', url: 'https://example.com/t', content: 'C', similarity: '0.75' }],
    });

    const hits = await new PgVectorIndex().query([0.5, 0.25], 3);

    expect(hits).toEqual({
      ok: true,
      value: [{ id: 'seed-1', title: 'T', url: 'https://example.com/t', content: 'C', similarity: 0.75 }],
    });
    expect(mockQuery.mock.calls[0][1]).toEqual(['[0.5,0.25]', 3]);
  });

  it('query() reports database failures as a Result', async () => {
    const { PgVectorIndex } = await import('../db/vector-index.js');
    mockQuery.mockRejectedValueOnce(new Error('connection refused'));

    expect(await new PgVectorIndex().query([0.1], 1)).toEqual({ ok: false, error: 'connection refused' });
  });
});
