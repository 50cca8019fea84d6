import { vi } from 'vitest';
import type { CommodityPrice, Location, PriceCatalog, PriceCatalogEntry, PriceSourceName, PriceTrend } from '../types';
import type { PriceSource } from '../services/price-sources/price-source';

export const FIXED_NOW = new Date('2026-03-15T06:00:00.000Z');

export function catalogEntry(
  commodityName: string,
  baselinePrice: number,
  trend: PriceTrend,
  knownMarkets: string[] = [],
  unit = 'quintal'
): PriceCatalogEntry {
  return { commodityName, baselinePrice, trend, knownMarkets, unit };
}

export function buildCatalog(entries: PriceCatalogEntry[]): PriceCatalog {
  return new Map(entries.map(entry => [entry.commodityName, entry]));
}

export const TEST_CATALOG = buildCatalog([
  catalogEntry('Rice', 2100, 'stable', ['Punjab', 'UP']),
  catalogEntry('Wheat', 2000, 'increasing', ['Punjab', 'Haryana']),
  catalogEntry('Cotton', 6620, 'decreasing', ['Gujarat']),
  catalogEntry('Jute', 4800, 'stable', [])
]);

export function commodityPrice(
  commodityName: string,
  currentPrice: number,
  priceTrend: PriceTrend,
  source: PriceSourceName = 'synthetic'
): CommodityPrice {
  return {
    commodityName,
    currentPrice,
    priceTrend,
    marketLocation: 'Delhi',
    observedAt: FIXED_NOW,
    source
  };
}

/**
 * In-process price source whose answers are scripted per commodity.
 */
export class StubPriceSource implements PriceSource {
  public readonly calls: string[] = [];

  constructor(
    public readonly name: PriceSourceName,
    private readonly answers: Record<string, number | Error> = {}
  ) {}

  async attempt(commodity: string, location: Location): Promise<CommodityPrice | null> {
    this.calls.push(commodity);
    const answer = this.answers[commodity];

    if (answer instanceof Error) {
      throw answer;
    }
    if (answer === undefined) {
      return null;
    }

    return {
      commodityName: commodity,
      currentPrice: answer,
      priceTrend: 'stable',
      marketLocation: location.state,
      observedAt: FIXED_NOW,
      source: this.name
    };
  }
}

export function fakeHttpClient() {
  return { get: vi.fn() };
}
