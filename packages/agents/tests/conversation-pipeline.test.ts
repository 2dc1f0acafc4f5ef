import { describe, it, expect, vi } from 'vitest';
import { ConversationPipeline } from '../orchestrator/pipeline.js';
import { LocalCheckpointStore, LocalRunRecordStore } from '../memory/conversation-store.js';
import { InvalidRequestError, PipelineError } from '../utils/errors.js';
import { SimpleEventBus, type DomainEvent } from '../types/events.js';
import { silentLogger } from '../utils/logger.js';
import type { PipelineDefinition, RunRecordBase, Stage } from '../types/pipeline.js';

interface EchoPayload {
  conversationId?: string;
  text: string;
}

interface EchoRecord extends RunRecordBase {
  text: string;
}

interface EchoState {
  conversationId: string;
  text: string;
  trail: string[];
  result: string | null;
  runs: EchoRecord[];
}

let clock = Date.parse('2024-05-01T12:00:00.000Z');

function stage(name: string, run?: Stage<EchoState>['run']): Stage<EchoState> {
  return {
    name,
    run: run ?? (async state => ({ trail: [...state.trail, name] })),
  };
}

const finalize = stage('finalize', async state => {
  clock += 1000;
  return {
    result: `${state.text}:${state.trail.join('>')}`,
    runs: [{ at: new Date(clock).toISOString(), conversationId: state.conversationId, text: state.text }],
  };
});

function makeDefinition(stages: Stage<EchoState>[]): PipelineDefinition<EchoPayload, EchoState, EchoRecord, string> {
  return {
    name: 'echo',
    parsePayload(raw) {
      if (typeof raw !== 'object' || raw === null || !('text' in raw) || typeof raw.text !== 'string' || !raw.text) {
        throw new InvalidRequestError('Invalid echo request', ['text: required']);
      }
      const conversationId = 'conversationId' in raw && typeof raw.conversationId === 'string'
        ? raw.conversationId
        : undefined;
      return { conversationId, text: raw.text };
    },
    conversationIdOf: payload => payload.conversationId,
    initialState: (conversationId, payload, history) => ({
      conversationId,
      text: payload.text,
      trail: [],
      result: null,
      runs: [...history],
    }),
    stages,
  };
}

function makePipeline(stages: Stage<EchoState>[] = [stage('a'), stage('b'), finalize]) {
  const checkpoints = new LocalCheckpointStore<EchoState>();
  const runStore = new LocalRunRecordStore<EchoRecord>();
  const eventBus = new SimpleEventBus();
  const pipeline = new ConversationPipeline(makeDefinition(stages), {
    checkpoints,
    runStore,
    eventBus,
    logger: silentLogger,
  });
  return { pipeline, checkpoints, runStore, eventBus };
}

function stageOf(event: DomainEvent): string {
  const payload = event.payload;
  return typeof payload === 'object' && payload !== null && 'stage' in payload ? String(payload.stage) : '';
}

describe('ConversationPipeline', () => {
  it('runs every stage once, in declared order, and returns the result', async () => {
    const { pipeline } = makePipeline();
    const result = await pipeline.run({ conversationId: 'conv-order', text: 'hi' });
    expect(result).toBe('hi:a>b');
  });

  it('assigns a conv-<uuid> identifier when none is supplied', async () => {
    const { pipeline } = makePipeline();
    await pipeline.run({ text: 'hello' });

    const [latest] = await pipeline.listConversations();
    expect(latest.conversationId).toMatch(/^conv-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('appends exactly one run record per run and seeds state from history', async () => {
    const { pipeline } = makePipeline();
    await pipeline.run({ conversationId: 'conv-1', text: 'one' });
    await pipeline.run({ conversationId: 'conv-1', text: 'two' });

    const runs = await pipeline.getRuns('conv-1');
    expect(runs.map(r => r.text)).toEqual(['one', 'two']);

    const history = await pipeline.getStateHistory('conv-1');
    expect(history).toHaveLength(2);
    expect(history[1].runs.map(r => r.text)).toEqual(['one', 'two']);
  });

  it('returns the latest result without re-running', async () => {
    const { pipeline } = makePipeline();
    await pipeline.run({ conversationId: 'conv-1', text: 'one' });
    await pipeline.run({ conversationId: 'conv-1', text: 'two' });

    expect(await pipeline.getLatestResult('conv-1')).toBe('two:a>b');
  });

  it('answers unknown conversations with an empty list and null', async () => {
    const { pipeline } = makePipeline();
    expect(await pipeline.getRuns('conv-missing')).toEqual([]);
    expect(await pipeline.getLatestResult('conv-missing')).toBeNull();
    expect(await pipeline.getStateHistory('conv-missing')).toEqual([]);
  });

  it('rejects invalid payloads before any stage and persists nothing', async () => {
    const spy = vi.fn(async () => ({}));
    const { pipeline, eventBus } = makePipeline([stage('a', spy), finalize]);
    const rejected: DomainEvent[] = [];
    eventBus.on('RunRejected', e => rejected.push(e));

    await expect(pipeline.run({ conversationId: 'conv-bad', text: '' })).rejects.toBeInstanceOf(InvalidRequestError);

    expect(spy).not.toHaveBeenCalled();
    expect(rejected).toHaveLength(1);
    expect(await pipeline.getRuns('conv-bad')).toEqual([]);
    expect(await pipeline.listConversations()).toEqual([]);
  });

  it('wraps stage exceptions in PipelineError naming the stage', async () => {
    const { pipeline } = makePipeline([
      stage('a'),
      stage('explode', async () => {
        throw new Error('kaboom');
      }),
      finalize,
    ]);

    const error = await pipeline.run({ conversationId: 'conv-err', text: 'x' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({ stage: 'explode', message: "Stage 'explode' failed: kaboom" });
    expect(await pipeline.getRuns('conv-err')).toEqual([]);
    expect(await pipeline.getLatestResult('conv-err')).toBeNull();
  });

  it('refuses a stage that changes the conversation id', async () => {
    const { pipeline } = makePipeline([
      stage('hijack', async () => ({ conversationId: 'conv-other' })),
      finalize,
    ]);

    await expect(pipeline.run({ conversationId: 'conv-1', text: 'x' })).rejects.toMatchObject({
      name: 'PipelineError',
      stage: 'hijack',
    });
  });

  it('fails when the stages produce no result', async () => {
    const { pipeline } = makePipeline([stage('a')]);
    await expect(pipeline.run({ conversationId: 'conv-1', text: 'x' })).rejects.toThrow(
      'Pipeline finished without a result',
    );
  });

  it('emits lifecycle events in order', async () => {
    const { pipeline, eventBus } = makePipeline();
    const seen: string[] = [];
    for (const type of ['RunStarted', 'StageCompleted', 'RunCompleted'] as const) {
      eventBus.on(type, e => seen.push(`${e.type}:${stageOf(e)}`));
    }

    await pipeline.run({ conversationId: 'conv-1', text: 'x' });

    expect(seen).toEqual([
      'RunStarted:',
      'StageCompleted:a',
      'StageCompleted:b',
      'StageCompleted:finalize',
      'RunCompleted:',
    ]);
  });

  it('serialises concurrent runs on one conversation', async () => {
    const { pipeline } = makePipeline();
    await Promise.all([
      pipeline.run({ conversationId: 'conv-c', text: 'first' }),
      pipeline.run({ conversationId: 'conv-c', text: 'second' }),
      pipeline.run({ conversationId: 'conv-c', text: 'third' }),
    ]);

    const runs = await pipeline.getRuns('conv-c');
    expect(runs.map(r => r.text)).toEqual(['first', 'second', 'third']);

    const history = await pipeline.getStateHistory('conv-c');
    expect(history.map(s => s.runs.length)).toEqual([1, 2, 3]);
  });

  it('lists the most recent record per conversation, newest first', async () => {
    const { pipeline } = makePipeline();
    await pipeline.run({ conversationId: 'conv-a', text: 'a1' });
    await pipeline.run({ conversationId: 'conv-b', text: 'b1' });
    await pipeline.run({ conversationId: 'conv-a', text: 'a2' });

    const latest = await pipeline.listConversations();
    expect(latest.map(r => `${r.conversationId}:${r.text}`)).toEqual(['conv-a:a2', 'conv-b:b1']);
  });
});
