import { describe, it, expect, beforeEach } from 'vitest';
import { AxiosError } from 'axios';
import {
  AgmarknetPriceSource,
  KrishiJagranPriceSource,
  MandiRecordsPriceSource,
  PriceSourceChain,
  createDefaultPriceSources,
  parsePriceValue
} from '../services/price-sources';
import { CircuitBreaker } from '../utils/circuit-breaker';
import { ErrorHandler, SourceUnavailableError } from '../utils/error-handling';
import { FIXED_NOW, StubPriceSource, fakeHttpClient } from './helpers';

const punjab = { state: 'Punjab' };

function ok(data: unknown) {
  return { status: 200, data };
}

describe('parsePriceValue', () => {
  it('accepts numbers and numeric strings', () => {
    expect(parsePriceValue(2150)).toBe(2150);
    expect(parsePriceValue('2150.50')).toBe(2150.5);
  });

  it('rejects negative and non-numeric values', () => {
    expect(parsePriceValue(-1)).toBeNull();
    expect(parsePriceValue('n/a')).toBeNull();
    expect(parsePriceValue(null)).toBeNull();
    expect(parsePriceValue(Infinity)).toBeNull();
  });
});

describe('AgmarknetPriceSource', () => {
  let http: ReturnType<typeof fakeHttpClient>;
  let source: AgmarknetPriceSource;

  beforeEach(() => {
    http = fakeHttpClient();
    source = new AgmarknetPriceSource({
      baseUrl: 'https://agmarknet.test/api/price/',
      timeoutMs: 500,
      httpClient: http,
      now: () => FIXED_NOW
    });
  });

  it('requests the commodity code and parses the latest quote', async () => {
    http.get.mockResolvedValue(ok({ price: [{ price: '2150', market: 'Khanna' }, { price: '2100', market: 'Ludhiana' }] }));

    const price = await source.attempt('Wheat', punjab);

    expect(http.get).toHaveBeenCalledWith('https://agmarknet.test/api/price/1102', expect.objectContaining({ timeout: 500 }));
    expect(price).toEqual({
      commodityName: 'Wheat',
      currentPrice: 2150,
      priceTrend: 'stable',
      marketLocation: 'Khanna',
      observedAt: FIXED_NOW,
      source: 'agmarknet'
    });
  });

  it('falls back to the state when the quote names no market', async () => {
    http.get.mockResolvedValue(ok({ price: [{ price: 2100 }] }));
    const price = await source.attempt('Rice', punjab);
    expect(price?.marketLocation).toBe('Punjab');
  });

  it('skips commodities without a code', async () => {
    expect(await source.attempt('Saffron', punjab)).toBeNull();
    expect(await source.attempt('toString', punjab)).toBeNull();
    expect(http.get).not.toHaveBeenCalled();
  });

  it('treats an empty price list as a miss', async () => {
    http.get.mockResolvedValue(ok({ price: [] }));
    expect(await source.attempt('Rice', punjab)).toBeNull();
  });

  it('rejects non-200 responses', async () => {
    http.get.mockResolvedValue({ status: 503, data: 'Service Unavailable' });
    await expect(source.attempt('Rice', punjab)).rejects.toThrow('agmarknet unavailable: HTTP 503');
  });

  it('rejects malformed payloads', async () => {
    http.get.mockResolvedValue(ok({ prices: [] }));
    await expect(source.attempt('Rice', punjab)).rejects.toThrow(SourceUnavailableError);

    http.get.mockResolvedValue(ok({ price: [{ price: 'n/a' }] }));
    await expect(source.attempt('Rice', punjab)).rejects.toThrow('malformed payload: invalid price "n/a"');
  });

  it('reports timeouts', async () => {
    http.get.mockRejectedValue(new AxiosError('timeout of 500ms exceeded', 'ECONNABORTED'));
    await expect(source.attempt('Rice', punjab)).rejects.toThrow('agmarknet unavailable: timed out after 500ms');
  });

  it('reports network errors', async () => {
    http.get.mockRejectedValue(new Error('getaddrinfo ENOTFOUND agmarknet.test'));
    await expect(source.attempt('Rice', punjab)).rejects.toThrow('agmarknet unavailable: getaddrinfo ENOTFOUND agmarknet.test');
  });

  it('stops calling a failing source once its circuit opens', async () => {
    let clock = FIXED_NOW.getTime();
    const breaker = new CircuitBreaker(
      { failureThreshold: 0.5, recoveryTimeout: 60000, monitoringPeriod: 120000, minimumRequests: 3 },
      () => clock
    );
    const guarded = new AgmarknetPriceSource({ baseUrl: 'https://agmarknet.test', timeoutMs: 500, httpClient: http, circuitBreaker: breaker });
    http.get.mockResolvedValue({ status: 500, data: null });

    for (let i = 0; i < 3; i++) {
      await expect(guarded.attempt('Rice', punjab)).rejects.toThrow(SourceUnavailableError);
    }

    expect(guarded.getHealth().state).toBe('open');
    expect(await guarded.attempt('Rice', punjab)).toBeNull();
    expect(http.get).toHaveBeenCalledTimes(3);

    clock += 60000;
    http.get.mockResolvedValue(ok({ price: [{ price: 2100 }] }));
    expect((await guarded.attempt('Rice', punjab))?.currentPrice).toBe(2100);
    expect(guarded.getHealth().state).toBe('closed');
  });

  it('sends one upstream request when concurrent attempts hit a recovering circuit', async () => {
    let clock = FIXED_NOW.getTime();
    const breaker = new CircuitBreaker(
      { failureThreshold: 0.5, recoveryTimeout: 60000, monitoringPeriod: 120000, minimumRequests: 3 },
      () => clock
    );
    const guarded = new AgmarknetPriceSource({ baseUrl: 'https://agmarknet.test', timeoutMs: 500, httpClient: http, circuitBreaker: breaker });
    http.get.mockResolvedValue({ status: 500, data: null });
    for (let i = 0; i < 3; i++) {
      await expect(guarded.attempt('Rice', punjab)).rejects.toThrow(SourceUnavailableError);
    }

    clock += 60000;
    http.get.mockResolvedValue(ok({ price: [{ price: 2100 }] }));
    const results = await Promise.all([
      guarded.attempt('Rice', punjab),
      guarded.attempt('Rice', punjab),
      guarded.attempt('Rice', punjab)
    ]);

    expect(http.get).toHaveBeenCalledTimes(4);
    expect(results.map(result => result?.currentPrice ?? null)).toEqual([2100, null, null]);
    expect(guarded.getHealth().state).toBe('closed');
  });
});

describe('MandiRecordsPriceSource', () => {
  it('carries nothing without an API key', async () => {
    const http = fakeHttpClient();
    const source = new MandiRecordsPriceSource({ baseUrl: 'https://records.test', timeoutMs: 500, apiKey: '', httpClient: http });

    expect(await source.attempt('Rice', punjab)).toBeNull();
    expect(http.get).not.toHaveBeenCalled();
  });

  it('filters by commodity and state and reads the modal price', async () => {
    const http = fakeHttpClient();
    http.get.mockResolvedValue(ok({ records: [{ commodity: 'Onion', market: 'Lasalgaon', modal_price: '1850' }] }));
    const source = new MandiRecordsPriceSource({ baseUrl: 'https://records.test', timeoutMs: 500, apiKey: 'test-key', httpClient: http });

    const price = await source.attempt('Onion', { state: 'Maharashtra' });

    expect(http.get).toHaveBeenCalledWith('https://records.test', expect.objectContaining({
      params: {
        'api-key': 'test-key',
        format: 'json',
        limit: '10',
        'filters[commodity]': 'Onion',
        'filters[state]': 'Maharashtra'
      }
    }));
    expect(price?.currentPrice).toBe(1850);
    expect(price?.marketLocation).toBe('Lasalgaon');
    expect(price?.source).toBe('data.gov.in');
  });
});

describe('KrishiJagranPriceSource', () => {
  it('matches the commodity by name and keeps its trend', async () => {
    const http = fakeHttpClient();
    http.get.mockResolvedValue(ok({
      data: [
        { commodity: 'Potato', price: 1150, market: 'Agra', trend: 'decreasing' },
        { commodity: 'tomato', price: 1620, market: 'Kolar', trend: 'increasing' }
      ]
    }));
    const source = new KrishiJagranPriceSource({ baseUrl: 'https://krishi.test', timeoutMs: 500, httpClient: http });

    const price = await source.attempt('Tomato', { state: 'Karnataka' });

    expect(price?.currentPrice).toBe(1620);
    expect(price?.priceTrend).toBe('increasing');
    expect(price?.marketLocation).toBe('Kolar');
  });

  it('defaults unknown trends to stable', async () => {
    const http = fakeHttpClient();
    http.get.mockResolvedValue(ok({ data: [{ commodity: 'Potato', price: 1150, trend: 'volatile' }] }));
    const source = new KrishiJagranPriceSource({ baseUrl: 'https://krishi.test', timeoutMs: 500, httpClient: http });

    expect((await source.attempt('Potato', punjab))?.priceTrend).toBe('stable');
  });

  it('misses when the listing lacks the commodity', async () => {
    const http = fakeHttpClient();
    http.get.mockResolvedValue(ok({ data: [{ commodity: 'Potato', price: 1150 }] }));
    const source = new KrishiJagranPriceSource({ baseUrl: 'https://krishi.test', timeoutMs: 500, httpClient: http });

    expect(await source.attempt('Onion', punjab)).toBeNull();
  });
});

describe('PriceSourceChain', () => {
  beforeEach(() => {
    ErrorHandler.getInstance().clear();
  });

  it('returns the first source with a price and skips the rest', async () => {
    const first = new StubPriceSource('agmarknet', { Rice: 2150 });
    const second = new StubPriceSource('data.gov.in', { Rice: 2300 });
    const chain = new PriceSourceChain([first, second]);

    const price = await chain.attempt('Rice', punjab);

    expect(price?.currentPrice).toBe(2150);
    expect(price?.source).toBe('agmarknet');
    expect(second.calls).toEqual([]);
  });

  it('moves past misses and failures in priority order', async () => {
    const failing = new StubPriceSource('agmarknet', { Wheat: new Error('connection reset') });
    const empty = new StubPriceSource('data.gov.in');
    const last = new StubPriceSource('krishijagran', { Wheat: 2290 });
    const chain = new PriceSourceChain([failing, empty, last]);

    const price = await chain.attempt('Wheat', punjab);

    expect(price?.source).toBe('krishijagran');
    expect(failing.calls).toEqual(['Wheat']);
    expect(empty.calls).toEqual(['Wheat']);
    expect(ErrorHandler.getInstance().getRecentErrors().map(e => e.code)).toEqual(['SOURCE_UNAVAILABLE']);
  });

  it('resolves to null when every source comes up empty', async () => {
    const chain = new PriceSourceChain([
      new StubPriceSource('agmarknet', { Rice: new Error('boom') }),
      new StubPriceSource('krishijagran')
    ]);

    await expect(chain.attempt('Rice', punjab)).resolves.toBeNull();
  });

  it('resolves to null with no sources', async () => {
    const chain = new PriceSourceChain([]);
    expect(chain.sourceNames).toEqual([]);
    expect(await chain.attempt('Rice', punjab)).toBeNull();
  });
});

describe('createDefaultPriceSources', () => {
  const settings = {
    enabled: true,
    timeoutMs: 500,
    agmarknetBaseUrl: 'https://agmarknet.test',
    mandiApiBaseUrl: 'https://records.test',
    mandiApiKey: '',
    krishiJagranBaseUrl: 'https://krishi.test',
    randomSeed: undefined
  };

  it('orders the sources by priority', () => {
    expect(createDefaultPriceSources(settings).map(s => s.name)).toEqual(['agmarknet', 'data.gov.in', 'krishijagran']);
  });

  it('returns no sources when disabled', () => {
    expect(createDefaultPriceSources({ ...settings, enabled: false })).toEqual([]);
  });
});
