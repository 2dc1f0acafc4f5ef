import { describe, it, expect, afterEach, vi } from 'vitest';
import { AlphaVantageClient, interpretQuoteResponse, toGlobalQuote, type QuoteClientConfig } from '../bridge/quote-client.js';

const config: QuoteClientConfig = {
  apiKey: 'test-secret',
  baseUrl: 'https://quotes.invalid/query',
  timeoutMs: 1000,
  rateLimitPerMinute: 5,
};

const IBM_QUOTE = {
  '01. symbol': 'IBM',
  '05. price': '170.2500',
  '06. volume': '3200000',
  '07. latest trading day': '2024-05-01',
  '08. previous close': '168.0000',
  '09. change': '2.2500',
  '10. change percent': '1.3393%',
};

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async () => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('toGlobalQuote', () => {
  it('fills missing fields with n/a', () => {
    expect(toGlobalQuote('XYZ', { '05. price': '1.00' })).toEqual({
      symbol: 'XYZ',
      price: '1.00',
      change: 'n/a',
      changePercent: 'n/a',
      latestTradingDay: 'n/a',
      previousClose: 'n/a',
      volume: 'n/a',
    });
  });
});

describe('interpretQuoteResponse', () => {
  it('treats Note and Information as rate limiting', () => {
    expect(interpretQuoteResponse('IBM', { Note: 'Slow down' })).toEqual({ status: 'rate_limited', note: 'Slow down' });
    expect(interpretQuoteResponse('IBM', { Information: 'Premium only' })).toEqual({
      status: 'rate_limited',
      note: 'Premium only',
    });
  });

  it('reports provider errors and empty quotes', () => {
    expect(interpretQuoteResponse('IBM', { 'Error Message': 'Invalid API call' })).toEqual({
      status: 'provider_error',
      message: 'Invalid API call',
    });
    expect(interpretQuoteResponse('IBM', { 'Global Quote': {} })).toEqual({ status: 'empty' });
    expect(interpretQuoteResponse('IBM', {})).toEqual({ status: 'empty' });
  });
});

describe('AlphaVantageClient', () => {
  it('reports a missing key without calling the API', async () => {
    const fetchMock = stubFetch({});
    const client = new AlphaVantageClient({ ...config, apiKey: undefined });

    expect(await client.quote('IBM')).toEqual({ status: 'error', reason: 'Missing ALPHA_VANTAGE_API_KEY' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('requests GLOBAL_QUOTE and caches successful quotes', async () => {
    const fetchMock = stubFetch({ 'Global Quote': IBM_QUOTE });
    const client = new AlphaVantageClient(config);

    const first = await client.quote(' ibm ');
    const second = await client.quote('IBM');

    expect(first).toEqual({
      status: 'ok',
      quote: {
        symbol: 'IBM',
        price: '170.2500',
        change: '2.2500',
        changePercent: '1.3393%',
        latestTradingDay: '2024-05-01',
        previousClose: '168.0000',
        volume: '3200000',
      },
    });
    expect(second).toEqual(first);
    expect(fetchMock).toHaveBeenCalledOnce();
    expect(fetchMock.mock.calls[0]).toEqual([
      'https://quotes.invalid/query?function=GLOBAL_QUOTE&symbol=IBM&apikey=test-secret',
      expect.objectContaining({ headers: { Accept: 'application/json' } }),
    ]);
  });

  it('does not cache rate-limit notes', async () => {
    const fetchMock = stubFetch({ Note: 'Thank you for using Alpha Vantage!' });
    const client = new AlphaVantageClient(config);

    await client.quote('IBM');
    const again = await client.quote('IBM');

    expect(again).toEqual({ status: 'rate_limited', note: 'Thank you for using Alpha Vantage!' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('enforces the local per-minute limit', async () => {
    stubFetch({ 'Global Quote': IBM_QUOTE });
    const client = new AlphaVantageClient({ ...config, rateLimitPerMinute: 1 });

    await client.quote('IBM');
    expect(await client.quote('MSFT')).toEqual({
      status: 'rate_limited',
      note: 'Local limit of 1 requests per minute reached. Try again shortly.',
    });
  });

  it('maps HTTP failures', async () => {
    stubFetch({}, 403);
    expect(await new AlphaVantageClient(config).quote('IBM')).toEqual({
      status: 'error',
      reason: 'Alpha Vantage rejected the API key',
    });

    stubFetch({}, 429);
    expect(await new AlphaVantageClient(config).quote('IBM')).toEqual({
      status: 'rate_limited',
      note: 'Rate limited by server',
    });

    stubFetch({}, 500);
    expect(await new AlphaVantageClient(config).quote('IBM')).toEqual({ status: 'error', reason: 'HTTP 500' });
  });

  it('rejects bodies that are not quote objects', async () => {
    stubFetch(['unexpected']);
    expect(await new AlphaVantageClient(config).quote('IBM')).toEqual({
      status: 'error',
      reason: 'Alpha Vantage returned an unexpected response',
    });
  });

  it('reports network failures as errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('getaddrinfo ENOTFOUND quotes.invalid');
    }));

    expect(await new AlphaVantageClient(config).quote('IBM')).toEqual({
      status: 'error',
      reason: 'getaddrinfo ENOTFOUND quotes.invalid',
    });
  });
});
