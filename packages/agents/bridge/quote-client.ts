// Alpha Vantage GLOBAL_QUOTE client with caching and rate limiting
// Never throws: every failure is reported as a QuoteOutcome.

import { z } from 'zod';
import type { GlobalQuote, QuoteOutcome } from '../types/finance.js';
import { errorMessage } from '../types/result.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface QuoteClientConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  rateLimitPerMinute: number;
  cacheTtlSeconds?: number;
}

export interface QuoteProvider {
  quote(symbol: string): Promise<QuoteOutcome>;
}

/** Quotes are realtime data; keep them briefly */
export const QUOTE_CACHE_TTL_SECONDS = 30;

const GlobalQuoteResponseSchema = z
  .object({
    'Global Quote': z.record(z.string()).optional(),
    Note: z.string().optional(),
    Information: z.string().optional(),
    'Error Message': z.string().optional(),
  })
  .passthrough();

type GlobalQuoteResponse = z.infer<typeof GlobalQuoteResponseSchema>;

function field(raw: Record<string, string>, key: string): string {
  return raw[key] ?? 'n/a';
}

export function toGlobalQuote(symbol: string, raw: Record<string, string>): GlobalQuote {
  return {
    symbol: raw['01. symbol'] ?? symbol,
    price: field(raw, '05. price'),
    change: field(raw, '09. change'),
    changePercent: field(raw, '10. change percent'),
    latestTradingDay: field(raw, '07. latest trading day'),
    previousClose: field(raw, '08. previous close'),
    volume: field(raw, '06. volume'),
  };
}

export function interpretQuoteResponse(symbol: string, body: GlobalQuoteResponse): QuoteOutcome {
  const note = body.Note ?? body.Information;
  if (note) return { status: 'rate_limited', note };
  if (body['Error Message']) return { status: 'provider_error', message: body['Error Message'] };

  const quote = body['Global Quote'];
  if (!quote || Object.keys(quote).length === 0) return { status: 'empty' };
  return { status: 'ok', quote: toGlobalQuote(symbol, quote) };
}

interface CacheEntry {
  outcome: QuoteOutcome;
  expiresAt: number;
}

export class AlphaVantageClient implements QuoteProvider {
  private cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];
  private readonly cacheTtlSeconds: number;

  constructor(
    private readonly config: QuoteClientConfig,
    private readonly logger: Logger = silentLogger,
  ) {
    this.cacheTtlSeconds = config.cacheTtlSeconds ?? QUOTE_CACHE_TTL_SECONDS;
  }

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.config.rateLimitPerMinute;
  }

  private getCached(symbol: string): QuoteOutcome | undefined {
    const entry = this.cache.get(symbol);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(symbol);
      return undefined;
    }
    return entry.outcome;
  }

  async quote(rawSymbol: string): Promise<QuoteOutcome> {
    const symbol = rawSymbol.trim().toUpperCase();
    if (!this.config.apiKey) {
      return { status: 'error', reason: 'Missing ALPHA_VANTAGE_API_KEY' };
    }

    const cached = this.getCached(symbol);
    if (cached) return cached;

    if (this.isRateLimited()) {
      return {
        status: 'rate_limited',
        note: `Local limit of ${this.config.rateLimitPerMinute} requests per minute reached. Try again shortly.`,
      };
    }
    this.requestTimestamps.push(Date.now());

    const url = new URL(this.config.baseUrl);
    url.searchParams.set('function', 'GLOBAL_QUOTE');
    url.searchParams.set('symbol', symbol);
    url.searchParams.set('apikey', this.config.apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        if (res.status === 401 || res.status === 403) return { status: 'error', reason: 'Alpha Vantage rejected the API key' };
        if (res.status === 429) return { status: 'rate_limited', note: 'Rate limited by server' };
        return { status: 'error', reason: `HTTP ${res.status}` };
      }

      const parsed = GlobalQuoteResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { status: 'error', reason: 'Alpha Vantage returned an unexpected response' };
      }

      const outcome = interpretQuoteResponse(symbol, parsed.data);
      if (outcome.status === 'ok' && this.cacheTtlSeconds > 0) {
        this.cache.set(symbol, { outcome, expiresAt: Date.now() + this.cacheTtlSeconds * 1000 });
      }
      return outcome;
    } catch (err) {
      const reason = controller.signal.aborted
        ? `Request timed out after ${this.config.timeoutMs}ms`
        : errorMessage(err);
      this.logger.warn('Quote request failed', { symbol, error: reason });
      return { status: 'error', reason };
    } finally {
      clearTimeout(timeout);
    }
  }
}
