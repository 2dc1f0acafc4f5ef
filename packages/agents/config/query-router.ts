// Finance query router: ticker detection, then ordered keyword routing, then finance_qa

import { AGENT_PROFILES, SPECIALIZED_ROUTING_ORDER, matchesProfile } from './agent-registry.js';
import type { RouteDecision } from '../types/finance.js';

const TICKER_PATTERNS: readonly RegExp[] = [
  /\$([A-Za-z]{1,6})\b/,
  /\b(?:stock\s+price|price|quote)\s+(?:of\s+)?([A-Za-z]{1,6})\b/i,
  /\b([A-Za-z]{1,6})\s+(?:stock\s+price|stock|quote)\b/i,
];

export const KEYWORD_ROUTE_REASON =
  'Routed by keyword match (specialized agents first; finance_qa fallback).';

/** First pattern hit, uppercased; null when the query names no ticker */
export function extractTicker(query: string): string | null {
  const q = query.trim();
  if (!q) return null;

  for (const pattern of TICKER_PATTERNS) {
    const match = pattern.exec(q);
    if (match?.[1]) return match[1].toUpperCase();
  }
  return null;
}

export function routeQuery(query: string): RouteDecision {
  const symbol = extractTicker(query);
  if (symbol) {
    return {
      agentId: 'stock_quote',
      agentName: AGENT_PROFILES.stock_quote.name,
      reason: `Detected a stock quote request for symbol '${symbol}'.`,
      symbol,
    };
  }

  const matched = SPECIALIZED_ROUTING_ORDER.find(id => matchesProfile(AGENT_PROFILES[id], query));
  const profile = AGENT_PROFILES[matched ?? 'finance_qa'];
  return {
    agentId: profile.id,
    agentName: profile.name,
    reason: KEYWORD_ROUTE_REASON,
    symbol: null,
  };
}
