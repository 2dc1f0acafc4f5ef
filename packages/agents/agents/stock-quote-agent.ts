// Stock Quote Agent: Alpha Vantage GLOBAL_QUOTE rendered as a markdown card

import type { QuoteProvider } from '../bridge/quote-client.js';
import type { MarketSnapshot, QuoteOutcome } from '../types/finance.js';
import { attachDisclaimer } from '../utils/disclaimers.js';

export function formatQuote(outcome: QuoteOutcome, symbol: string): string {
  switch (outcome.status) {
    case 'error':
      return attachDisclaimer(`Stock quote failed for **${symbol}**: ${outcome.reason}`);
    case 'rate_limited':
      return attachDisclaimer(`Alpha Vantage rate limit: ${outcome.note}`);
    case 'provider_error':
      return attachDisclaimer(`Alpha Vantage error for **${symbol}**: ${outcome.message}`);
    case 'empty':
      return attachDisclaimer(`No quote data available for **${symbol}**.`);
    case 'ok': {
      const q = outcome.quote;
      const lines = [
        `**${symbol}** (Alpha Vantage GLOBAL_QUOTE)`,
        `- Price: \`${q.price}\``,
        `- Change: \`${q.change}\` (${q.changePercent})`,
        `- Latest trading day: \`${q.latestTradingDay}\``,
        `- Previous close: \`${q.previousClose}\``,
        `- Volume: \`${q.volume}\``,
      ];
      return attachDisclaimer(lines.join('\n'));
    }
  }
}

export class StockQuoteAgent {
  constructor(private readonly provider: QuoteProvider) {}

  async run(symbol: string): Promise<{ market: MarketSnapshot; answer: string }> {
    const outcome = await this.provider.quote(symbol);
    return {
      market: { provider: 'alpha_vantage', symbol, outcome },
      answer: formatQuote(outcome, symbol),
    };
  }
}
