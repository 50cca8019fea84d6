import type {
  CommodityPrice,
  Location,
  MarketOverview,
  MarketSummary,
  PriceCatalog,
  PriceCatalogEntry,
  PriceTrendSummary,
  ServiceResult
} from '../types';
import { ErrorHandler, ServiceError, toError } from '../utils/error-handling';
import { Logger } from '../utils/logger';
import { MarketAnalyzer } from './market-analyzer';
import { PriceSourceChain } from './price-sources/price-source-chain';
import { DEFAULT_TREND_DAYS, SyntheticPriceGenerator } from './synthetic-price.generator';

export interface CommodityPriceServiceDeps {
  catalog: PriceCatalog;
  sourceChain: PriceSourceChain;
  generator: SyntheticPriceGenerator;
  analyzer?: MarketAnalyzer;
}

function failure<T>(error: ServiceError): ServiceResult<T> {
  return { success: false, error: { code: error.code, message: error.message } };
}

/**
 * Commodity prices from free sources with a synthetic fallback, plus trend and
 * market summaries built on top of them.
 */
export class CommodityPriceService {
  private readonly catalog: PriceCatalog;
  private readonly sourceChain: PriceSourceChain;
  private readonly generator: SyntheticPriceGenerator;
  private readonly analyzer: MarketAnalyzer;
  private readonly errorHandler = ErrorHandler.getInstance();
  private readonly logger = new Logger('CommodityPriceService');

  constructor(deps: CommodityPriceServiceDeps) {
    this.catalog = deps.catalog;
    this.sourceChain = deps.sourceChain;
    this.generator = deps.generator;
    this.analyzer = deps.analyzer ?? new MarketAnalyzer();
  }

  listCommodities(): PriceCatalogEntry[] {
    return [...this.catalog.values()];
  }

  /**
   * One price per requested commodity, in request order (catalog order when none
   * are given). Never rejects: every failure ends in a synthetic price.
   */
  async getPrices(location: Location, commodities?: readonly string[]): Promise<CommodityPrice[]> {
    const requested = commodities ?? [...this.catalog.keys()];
    const startTime = Date.now();

    const prices = await Promise.all(requested.map(commodity => this.resolvePrice(commodity, location)));

    this.logger.info('Commodity prices resolved', {
      state: location.state,
      commodities: requested.length,
      live: prices.filter(p => p.source !== 'synthetic').length,
      durationMs: Date.now() - startTime
    });

    return prices;
  }

  private async resolvePrice(commodity: string, location: Location): Promise<CommodityPrice> {
    try {
      const livePrice = await this.sourceChain.attempt(commodity, location);
      if (livePrice) {
        return livePrice;
      }
    } catch (error) {
      this.logger.warn('Price source chain failed, using synthetic price', {
        commodity,
        error: toError(error).message
      });
    }

    return this.generator.generateCurrent(commodity, location);
  }

  getPriceTrends(commodity: string, days: number = DEFAULT_TREND_DAYS): ServiceResult<PriceTrendSummary> {
    try {
      return { success: true, data: this.generator.summarizeTrend(commodity, days) };
    } catch (error) {
      if (error instanceof ServiceError) {
        this.logger.info('Trend query rejected', { commodity, days, code: error.code });
        return failure(error);
      }
      throw error;
    }
  }

  getMarketAnalysis(prices: readonly CommodityPrice[]): ServiceResult<MarketSummary> {
    try {
      return { success: true, data: this.analyzer.analyze(prices) };
    } catch (error) {
      if (error instanceof ServiceError) {
        this.errorHandler.recordError(error);
        return failure(error);
      }
      throw error;
    }
  }

  /**
   * Prices for the location together with their market summary.
   */
  async getMarketOverview(location: Location, commodities?: readonly string[]): Promise<ServiceResult<MarketOverview>> {
    const prices = await this.getPrices(location, commodities);
    const analysis = this.getMarketAnalysis(prices);

    if (!analysis.success) {
      return analysis;
    }

    return { success: true, data: { location, prices, analysis: analysis.data } };
  }
}
