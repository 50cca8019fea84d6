import type { CommodityPrice, Location, PriceCatalog, PriceCatalogEntry, PriceTrend, PriceTrendSummary, TrendPoint } from '../types';
import { NotFoundError, ValidationError } from '../utils/error-handling';
import { type RandomSource, roundPrice } from '../utils/random';
import { MarketResolver } from './market-resolver';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_BASELINE_PRICE = 2000;
export const DEFAULT_UNIT = 'quintal';
export const PRICE_VARIATION = 0.1;
export const PRICE_FLOOR_RATIO = 0.5;
export const DEFAULT_TREND_DAYS = 30;

export interface SyntheticPriceGeneratorOptions {
  random?: RandomSource;
  now?: () => Date;
  marketResolver?: MarketResolver;
}

/**
 * Price for day `index` of a trend window, before the floor is applied.
 */
export function trendPriceAt(baseline: number, trend: PriceTrend, index: number): number {
  switch (trend) {
    case 'increasing':
      return baseline + (index * 15) + (index * index * 0.5);
    case 'decreasing':
      return baseline - (index * 8) + (index * index * 0.2);
    case 'stable':
      return index % 2 === 0 ? baseline + index * 5 : baseline - index * 3;
  }
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class SyntheticPriceGenerator {
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly marketResolver: MarketResolver;

  constructor(private readonly catalog: PriceCatalog, options: SyntheticPriceGeneratorOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.marketResolver = options.marketResolver ?? new MarketResolver();
  }

  /**
   * Catalog entry for the commodity, or the defaults used for commodities the
   * catalog does not know (baseline 2000, stable, quintal, traded at the caller's state).
   */
  entryFor(commodity: string, location: Location): PriceCatalogEntry {
    return this.catalog.get(commodity) ?? {
      commodityName: commodity,
      baselinePrice: DEFAULT_BASELINE_PRICE,
      trend: 'stable',
      knownMarkets: [location.state],
      unit: DEFAULT_UNIT
    };
  }

  private requireEntry(commodity: string, operation: string): PriceCatalogEntry {
    const entry = this.catalog.get(commodity);
    if (!entry) {
      throw new NotFoundError(`Commodity "${commodity}" not found in price catalog`, {
        service: 'synthetic_prices',
        operation,
        metadata: { commodity }
      });
    }
    return entry;
  }

  generateCurrent(commodity: string, location: Location): CommodityPrice {
    const entry = this.entryFor(commodity, location);
    const variation = entry.baselinePrice * PRICE_VARIATION;
    // random() is in [0, 1), so the offset stays within ±variation
    const offset = (this.random() * 2 - 1) * variation;

    return Object.freeze({
      commodityName: commodity,
      currentPrice: Math.max(0, roundPrice(entry.baselinePrice + offset)),
      priceTrend: entry.trend,
      marketLocation: this.marketResolver.resolveMarket(location, entry.knownMarkets),
      observedAt: this.now(),
      source: 'synthetic' as const
    });
  }

  /**
   * Daily history ending yesterday. Prices never drop below half the baseline.
   */
  generateTrend(commodity: string, days: number = DEFAULT_TREND_DAYS): TrendPoint[] {
    const entry = this.requireEntry(commodity, 'generateTrend');

    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError(`days must be a positive integer, got ${days}`, {
        service: 'synthetic_prices',
        operation: 'generateTrend',
        metadata: { commodity, days }
      });
    }

    const floor = entry.baselinePrice * PRICE_FLOOR_RATIO;
    const nowMs = this.now().getTime();
    const points: TrendPoint[] = [];

    for (let i = 0; i < days; i++) {
      points.push({
        date: formatDate(new Date(nowMs - (days - i) * DAY_MS)),
        price: Math.max(roundPrice(trendPriceAt(entry.baselinePrice, entry.trend, i)), floor)
      });
    }

    return points;
  }

  summarizeTrend(commodity: string, days: number = DEFAULT_TREND_DAYS): PriceTrendSummary {
    const entry = this.requireEntry(commodity, 'summarizeTrend');
    const priceHistory = this.generateTrend(commodity, days);
    const first = priceHistory[0];
    const last = priceHistory[priceHistory.length - 1];

    return {
      commodity,
      trend: entry.trend,
      priceHistory,
      currentPrice: entry.baselinePrice,
      priceChange: roundPrice(last.price - first.price),
      unit: entry.unit,
      source: 'Synthetic trend model'
    };
  }
}
