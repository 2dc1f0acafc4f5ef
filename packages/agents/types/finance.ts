// Finance assistant: state, route decisions and run records

import type { ConversationStateBase, RunRecordBase } from './pipeline.js';

export type SpecializedAgentId = 'tax' | 'portfolio' | 'news' | 'goals' | 'market';
export type FinanceAgentId = 'stock_quote' | 'finance_qa' | SpecializedAgentId;

export interface FinancePayload {
  conversationId?: string;
  query: string;
}

export interface RouteDecision {
  agentId: FinanceAgentId;
  agentName: string;
  reason: string;
  symbol: string | null;   // uppercased ticker for stock_quote, otherwise null
}

export interface RetrievedDocument {
  title: string;
  url: string;
  summary: string;
}

export interface GlobalQuote {
  symbol: string;
  price: string;
  change: string;
  changePercent: string;
  latestTradingDay: string;
  previousClose: string;
  volume: string;
}

export type QuoteOutcome =
  | { status: 'ok'; quote: GlobalQuote }
  | { status: 'error'; reason: string }
  | { status: 'rate_limited'; note: string }
  | { status: 'provider_error'; message: string }
  | { status: 'empty' };

export interface MarketSnapshot {
  provider: 'alpha_vantage';
  symbol: string;
  outcome: QuoteOutcome;
}

export interface FinanceMetadata {
  conversationId: string;
  askedAt: string;
}

export interface FinanceResult {
  metadata: FinanceMetadata;
  request: { query: string };
  route: RouteDecision | null;
  retrieval: { docs: RetrievedDocument[] };
  market: MarketSnapshot | null;
  answer: string;
}

export interface FinanceRunRecord extends RunRecordBase {
  readonly agentId: FinanceAgentId;
  readonly agentName: string;
  readonly query: string;           // truncated to 160 chars
  readonly symbol: string | null;
}

/**
 * One finance run. Merge policy per field:
 * - runs: append
 * - everything else: replace
 */
export interface FinanceState extends ConversationStateBase<FinanceRunRecord, FinanceResult> {
  rawPayload: { conversationId: string; query: string };
  metadata: FinanceMetadata;
  route: RouteDecision | null;
  retrieval: { docs: RetrievedDocument[] };
  market: MarketSnapshot | null;
  answer: string;
}
