import { describe, it, expect } from 'vitest';
import { createFinancePipeline, type FinancePipelineDeps } from '../orchestrator/finance-pipeline.js';
import { AlphaVantageClient, type QuoteProvider } from '../bridge/quote-client.js';
import { LocalCheckpointStore, LocalRunRecordStore } from '../memory/conversation-store.js';
import { StaticDocumentRetriever, fallbackDocuments } from '../memory/knowledge-retriever.js';
import { FINANCE_DISCLAIMER } from '../utils/disclaimers.js';
import { InvalidRequestError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { FinanceRunRecord, FinanceState, QuoteOutcome } from '../types/finance.js';

const keylessQuotes = new AlphaVantageClient({
  baseUrl: 'https://quotes.invalid/query',
  timeoutMs: 1000,
  rateLimitPerMinute: 5,
});

function makePipeline(overrides: Partial<FinancePipelineDeps> = {}) {
  return createFinancePipeline(
    { quotes: keylessQuotes, retriever: new StaticDocumentRetriever(), ...overrides },
    {
      checkpoints: new LocalCheckpointStore<FinanceState>(),
      runStore: new LocalRunRecordStore<FinanceRunRecord>(),
      logger: silentLogger,
    },
  );
}

class FixedQuotes implements QuoteProvider {
  readonly symbols: string[] = [];
  constructor(private readonly outcome: QuoteOutcome) {}
  async quote(symbol: string): Promise<QuoteOutcome> {
    this.symbols.push(symbol);
    return this.outcome;
  }
}

describe('finance pipeline', () => {
  it('reports a missing quote key without failing the run', async () => {
    const pipeline = makePipeline();
    const result = await pipeline.run({ conversation_id: 'conv-ibm', query: 'What is the price of IBM?' });

    expect(result.route).toMatchObject({ agentId: 'stock_quote', agentName: 'Stock Quote Agent', symbol: 'IBM' });
    expect(result.market).toEqual({
      provider: 'alpha_vantage',
      symbol: 'IBM',
      outcome: { status: 'error', reason: 'Missing ALPHA_VANTAGE_API_KEY' },
    });
    expect(result.answer).toBe(
      `Stock quote failed for **IBM**: Missing ALPHA_VANTAGE_API_KEY\n\n⚠️ ${FINANCE_DISCLAIMER}`,
    );
    expect(result.retrieval.docs).toEqual([]);
  });

  it('renders a successful quote as a markdown card', async () => {
    const quotes = new FixedQuotes({
      status: 'ok',
      quote: {
        symbol: 'NVDA',
        price: '120.50',
        change: '1.25',
        changePercent: '1.05%',
        latestTradingDay: '2024-05-01',
        previousClose: '119.25',
        volume: '1000',
      },
    });
    const pipeline = makePipeline({ quotes });

    const result = await pipeline.run({ query: '$nvda' });

    expect(quotes.symbols).toEqual(['NVDA']);
    expect(result.answer.split('\n').slice(0, 6)).toEqual([
      '**NVDA** (Alpha Vantage GLOBAL_QUOTE)',
      '- Price: `120.50`',
      '- Change: `1.25` (1.05%)',
      '- Latest trading day: `2024-05-01`',
      '- Previous close: `119.25`',
      '- Volume: `1000`',
    ]);
  });

  it('answers non-quote questions with learning resources', async () => {
    const pipeline = makePipeline();
    const result = await pipeline.run({ conversation_id: 'conv-p', query: 'Can you review my portfolio allocation?' });

    expect(result.route).toMatchObject({ agentId: 'portfolio', agentName: 'Portfolio Analysis Agent', symbol: null });
    expect(result.market).toBeNull();
    expect(result.retrieval.docs).toEqual(fallbackDocuments());
    expect(result.answer.startsWith('Here are learning resources related to your question:\n- ')).toBe(true);
    expect(result.answer.endsWith(FINANCE_DISCLAIMER)).toBe(true);
  });

  it('falls back to finance_qa when nothing matches', async () => {
    const pipeline = makePipeline();
    const result = await pipeline.run({ query: 'Define compound interest' });
    expect(result.route?.agentId).toBe('finance_qa');
  });

  it('trims the query and stamps metadata from the injected clock', async () => {
    const pipeline = makePipeline({ now: () => new Date('2024-05-01T09:30:00.000Z') });
    const result = await pipeline.run({ conversation_id: 'conv-t', query: '   Define compound interest  ' });

    expect(result.request).toEqual({ query: 'Define compound interest' });
    expect(result.metadata).toEqual({ conversationId: 'conv-t', askedAt: '2024-05-01T09:30:00.000Z' });
  });

  it('accumulates run records per conversation', async () => {
    const pipeline = makePipeline();
    await pipeline.run({ conversation_id: 'conv-1', query: 'Any news on the bond market?' });
    await pipeline.run({ conversation_id: 'conv-1', query: 'How are my holdings taxed?' });

    const runs = await pipeline.getRuns('conv-1');
    expect(runs.map(r => r.agentId)).toEqual(['news', 'tax']);
    expect(runs.every(r => r.conversationId === 'conv-1')).toBe(true);

    const latest = await pipeline.getLatestResult('conv-1');
    expect(latest?.route?.agentId).toBe('tax');
  });

  it('truncates the recorded query to 160 characters', async () => {
    const pipeline = makePipeline();
    const query = `Define compound interest ${'x'.repeat(300)}`;
    await pipeline.run({ conversation_id: 'conv-long', query });

    const [record] = await pipeline.getRuns('conv-long');
    expect(record.query).toHaveLength(160);
    expect(record.query).toBe(query.slice(0, 160));
  });

  it('keeps run timestamps non-decreasing when the clock goes backwards', async () => {
    const times = ['2024-05-01T10:00:00.000Z', '2024-05-01T09:00:00.000Z'];
    let call = 0;
    const pipeline = makePipeline({
      // intake and finalize each read the clock once per run
      now: () => new Date(times[Math.floor(call++ / 2)] ?? times[1]),
    });

    await pipeline.run({ conversation_id: 'conv-clock', query: 'Define compound interest' });
    await pipeline.run({ conversation_id: 'conv-clock', query: 'Define compound interest' });

    const runs = await pipeline.getRuns('conv-clock');
    expect(runs.map(r => r.at)).toEqual(['2024-05-01T10:00:00.000Z', '2024-05-01T10:00:00.000Z']);
  });

  it('lists the latest run of every conversation', async () => {
    const pipeline = makePipeline();
    await pipeline.run({ conversation_id: 'conv-a', query: 'Define compound interest' });
    await pipeline.run({ conversation_id: 'conv-b', query: 'Any news on the bond market?' });

    const conversations = await pipeline.listConversations();
    expect(conversations.map(c => c.conversationId).sort()).toEqual(['conv-a', 'conv-b']);
  });

  it('returns empty history for unknown conversations', async () => {
    const pipeline = makePipeline();
    expect(await pipeline.getRuns('conv-nope')).toEqual([]);
    expect(await pipeline.getLatestResult('conv-nope')).toBeNull();
  });

  it.each(['', '   ', null])('assigns a fresh id when conversation_id is %j', async id => {
    const pipeline = makePipeline();
    const result = await pipeline.run({ conversation_id: id, query: 'What is an ETF?' });

    expect(result.metadata.conversationId).toMatch(/^conv-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(await pipeline.getRuns(result.metadata.conversationId)).toHaveLength(1);
  });

  it('routes an empty question to the general agent', async () => {
    const pipeline = makePipeline();
    const result = await pipeline.run({ conversation_id: 'conv-blank', query: '   ' });

    expect(result.request).toEqual({ query: '' });
    expect(result.route?.agentId).toBe('finance_qa');
    expect(result.retrieval.docs).toEqual(fallbackDocuments());
  });

  it('rejects payloads whose query is not text', async () => {
    const pipeline = makePipeline();
    await expect(pipeline.run({ query: 42 })).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(pipeline.run('What is an ETF?')).rejects.toThrow(/^Invalid finance request/);
    expect(await pipeline.listConversations()).toEqual([]);
  });
});
