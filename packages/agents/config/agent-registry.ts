// Finance agent registry: profiles for the seven finance agents
// Routing keywords are matched as lower-case substrings of the query.

import type { FinanceAgentId, SpecializedAgentId } from '../types/finance.js';

export interface AgentProfile {
  id: FinanceAgentId;
  name: string;
  description: string;
  responsibilities: string[];
  routingKeywords: string[];
  outputFormat: string;
  safetyNotes: string[];
}

export const AGENT_PROFILES: Record<FinanceAgentId, AgentProfile> = {
  finance_qa: {
    id: 'finance_qa',
    name: 'Finance Q&A Agent',
    description: 'Provides general-purpose financial education and definitions.',
    responsibilities: [
      'Answer basic financial literacy questions',
      'Explain terminology in approachable language',
      'Offer links to relevant educational resources',
    ],
    routingKeywords: ['what is', 'define', 'explain', 'how do', 'difference'],
    outputFormat: 'Bulleted explanations with short examples and citations',
    safetyNotes: ['Avoid prescriptive investment recommendations.'],
  },
  portfolio: {
    id: 'portfolio',
    name: 'Portfolio Analysis Agent',
    description: 'Reviews user-provided holdings and risk preferences.',
    responsibilities: [
      'Summarize diversification and asset allocation',
      'Highlight concentration risk',
      'Map holdings to typical risk tolerance bands',
    ],
    routingKeywords: ['portfolio', 'allocation', 'diversification', 'holdings', 'rebalance'],
    outputFormat: 'Table of metrics plus a concise narrative summary',
    safetyNotes: ['Explicitly state results are educational, not individualized advice.'],
  },
  market: {
    id: 'market',
    name: 'Market Analysis Agent',
    description: 'Shares market context and trend highlights using cached data feeds.',
    responsibilities: [
      'Summarize index and sector movements',
      'Call out unusual volatility or volume',
      'Provide risk-aware takeaways for beginners',
    ],
    routingKeywords: ['market', 'index', 'sector', 'volatility', 'trend', 'macro'],
    outputFormat: 'Headline-style notes with percentage changes and source citations',
    safetyNotes: ['Avoid forward-looking predictions; focus on observed data.'],
  },
  goals: {
    id: 'goals',
    name: 'Goal Planning Agent',
    description: 'Guides users through setting time-bound financial goals.',
    responsibilities: [
      'Clarify time horizon, budget, and risk appetite',
      'Map goals to savings or investment vehicles',
      'Provide next-step checklists',
    ],
    routingKeywords: ['goal', 'plan', 'timeline', 'budget', 'retirement', 'college'],
    outputFormat: 'Step-by-step plan with milestones and links to education',
    safetyNotes: ['Encourage users to consult professionals for personal plans.'],
  },
  news: {
    id: 'news',
    name: 'News Synthesizer Agent',
    description: 'Condenses financial news with context relevant to beginners.',
    responsibilities: [
      'Summarize articles in plain language',
      'Explain why the story matters to long-term investors',
      'Provide neutral, citation-backed commentary',
    ],
    routingKeywords: ['news', 'headline', 'article', 'update', 'report'],
    outputFormat: '3-5 bullet digest with source links',
    safetyNotes: ['Avoid sensationalism and keep language measured.'],
  },
  tax: {
    id: 'tax',
    name: 'Tax Education Agent',
    description: 'Explains tax-advantaged accounts and filing basics (not tax advice).',
    responsibilities: [
      'Define key account types (401k, IRA, HSA)',
      'Clarify contribution limits and timelines',
      'Outline questions to ask a professional',
    ],
    routingKeywords: ['tax', 'ira', '401k', 'hsa', 'deduction', 'withholding'],
    outputFormat: 'FAQ-style responses with references to official sources',
    safetyNotes: [
      'Remind users to consult certified tax professionals',
      'Do not offer jurisdiction-specific filing advice',
    ],
  },
  stock_quote: {
    id: 'stock_quote',
    name: 'Stock Quote Agent',
    description: 'Fetches the latest quote for a ticker from Alpha Vantage.',
    responsibilities: [
      'Detect ticker symbols in the question',
      'Report price, change, previous close and volume',
    ],
    // Routed by ticker detection, never by keyword
    routingKeywords: [],
    outputFormat: 'Markdown quote card with raw provider values',
    safetyNotes: ['Quotes may be delayed; do not present them as trading signals.'],
  },
};

/** Keyword-routed agents, tested in this order; first match wins */
export const SPECIALIZED_ROUTING_ORDER: readonly SpecializedAgentId[] = [
  'tax',
  'portfolio',
  'news',
  'goals',
  'market',
];

export function matchesProfile(profile: AgentProfile, query: string): boolean {
  const lower = query.toLowerCase();
  return profile.routingKeywords.some(keyword => lower.includes(keyword));
}

export function listAgentProfiles(): AgentProfile[] {
  return Object.values(AGENT_PROFILES);
}
