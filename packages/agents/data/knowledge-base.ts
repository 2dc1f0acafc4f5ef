// Seed articles for the finance knowledge base (ingested into pgvector, and the static fallback)

import { createHash } from 'node:crypto';

export interface SeedArticle {
  title: string;
  category: string;
  url: string;
  content: string;
}

export const SEED_ARTICLES: readonly SeedArticle[] = [
  {
    title: 'Why diversification matters',
    category: 'portfolio_basics',
    url: 'https://example.com/diversification',
    content:
      'Diversification spreads money across asset classes, sectors and regions so that a loss in one holding ' +
      'has a smaller effect on the whole portfolio. It does not remove market risk, but it reduces the damage ' +
      'any single company or industry can do. Rebalancing keeps the allocation close to its target over time.',
  },
  {
    title: 'Market indices explained',
    category: 'market_fundamentals',
    url: 'https://example.com/indices',
    content:
      'A market index tracks the performance of a basket of securities, such as the 500 large companies in the ' +
      'S&P 500. Indices can be price-weighted, market-cap weighted or equal weighted. Index funds try to match ' +
      'an index rather than beat it, which usually keeps fees low.',
  },
  {
    title: 'Tax-advantaged accounts overview',
    category: 'tax_education',
    url: 'https://example.com/tax-accounts',
    content:
      'Accounts such as a 401k, an IRA or an HSA offer tax benefits in exchange for rules on contributions and ' +
      'withdrawals. Traditional accounts defer tax until withdrawal, Roth accounts tax contributions up front. ' +
      'Contribution limits change yearly, so check official sources or a tax professional.',
  },
];

/** Stable id for re-ingestion: `seed-` + first 12 hex chars of sha1(title|category) */
export function seedDocumentId(article: Pick<SeedArticle, 'title' | 'category'>): string {
  const digest = createHash('sha1').update(`${article.title}|${article.category}`, 'utf-8').digest('hex');
  return `seed-${digest.slice(0, 12)}`;
}
