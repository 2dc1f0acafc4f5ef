// Finance assistant pipeline: intake -> route -> execute -> finalize

import { StockQuoteAgent } from '../agents/stock-quote-agent.js';
import { KnowledgeAgent } from '../agents/knowledge-agent.js';
import type { QuoteProvider } from '../bridge/quote-client.js';
import { routeQuery } from '../config/query-router.js';
import type { DocumentRetriever } from '../memory/knowledge-retriever.js';
import type {
  FinancePayload,
  FinanceResult,
  FinanceRunRecord,
  FinanceState,
} from '../types/finance.js';
import type { PipelineDefinition, Stage } from '../types/pipeline.js';
import { parseFinancePayload } from '../utils/validation.js';
import { ConversationPipeline, type ConversationPipelineConfig } from './pipeline.js';
import { nextRunTimestamp } from './state-merge.js';

export const FINANCE_PIPELINE_NAME = 'finance';
export const RUN_RECORD_QUERY_LIMIT = 160;

export interface FinancePipelineDeps {
  quotes: QuoteProvider;
  retriever: DocumentRetriever;
  now?: () => Date;
}

export type FinancePipeline = ConversationPipeline<FinancePayload, FinanceState, FinanceRunRecord, FinanceResult>;

export function createFinancePipelineDefinition(
  deps: FinancePipelineDeps,
): PipelineDefinition<FinancePayload, FinanceState, FinanceRunRecord, FinanceResult> {
  const now = deps.now ?? (() => new Date());
  const stockQuotes = new StockQuoteAgent(deps.quotes);
  const knowledge = new KnowledgeAgent(deps.retriever);

  const intake: Stage<FinanceState> = {
    name: 'intake',
    async run(state) {
      const query = state.rawPayload.query.trim();
      return {
        rawPayload: { conversationId: state.conversationId, query },
        metadata: { conversationId: state.conversationId, askedAt: now().toISOString() },
        route: null,
        retrieval: { docs: [] },
        market: null,
        answer: '',
        result: null,
      };
    },
  };

  const route: Stage<FinanceState> = {
    name: 'route',
    async run(state) {
      return { route: routeQuery(state.rawPayload.query) };
    },
  };

  const execute: Stage<FinanceState> = {
    name: 'execute',
    async run(state) {
      const decision = state.route ?? routeQuery(state.rawPayload.query);

      if (decision.agentId === 'stock_quote' && decision.symbol) {
        const { market, answer } = await stockQuotes.run(decision.symbol);
        return { market, retrieval: { docs: [] }, answer };
      }

      const { docs, answer } = await knowledge.run(state.rawPayload.query);
      return { retrieval: { docs }, market: null, answer };
    },
  };

  const finalize: Stage<FinanceState> = {
    name: 'finalize',
    async run(state) {
      const decision = state.route ?? routeQuery(state.rawPayload.query);
      const result: FinanceResult = {
        metadata: state.metadata,
        request: { query: state.rawPayload.query },
        route: decision,
        retrieval: state.retrieval,
        market: state.market,
        answer: state.answer,
      };

      const record: FinanceRunRecord = {
        at: nextRunTimestamp(state.runs.at(-1)?.at, now()),
        conversationId: state.conversationId,
        agentId: decision.agentId,
        agentName: decision.agentName,
        query: state.rawPayload.query.slice(0, RUN_RECORD_QUERY_LIMIT),
        symbol: decision.symbol,
      };

      return { result, runs: [record] };
    },
  };

  return {
    name: FINANCE_PIPELINE_NAME,
    parsePayload: parseFinancePayload,
    conversationIdOf: payload => payload.conversationId,
    initialState: (conversationId, payload, history) => ({
      conversationId,
      rawPayload: { conversationId, query: payload.query },
      metadata: { conversationId, askedAt: '' },
      route: null,
      retrieval: { docs: [] },
      market: null,
      answer: '',
      result: null,
      runs: [...history],
    }),
    stages: [intake, route, execute, finalize],
  };
}

export function createFinancePipeline(
  deps: FinancePipelineDeps,
  config: ConversationPipelineConfig<FinanceState, FinanceRunRecord>,
): FinancePipeline {
  return new ConversationPipeline(createFinancePipelineDefinition(deps), config);
}
