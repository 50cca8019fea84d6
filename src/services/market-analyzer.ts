import type { CommodityPrice, MarketSentiment, MarketSummary, PerformerSnapshot, PriceSourceName, PriceTrend } from '../types';
import { EmptyInputError } from '../utils/error-handling';
import { roundPrice } from '../utils/random';

export const BULLISH_THRESHOLD_PCT = 60;
export const BEARISH_THRESHOLD_PCT = 60;
export const RECOMMENDATION_SHARE = 0.6;

export const RECOMMENDATIONS = {
  upward: 'Market is showing strong upward trends - good time for planting high-value crops',
  declining: 'Market is declining - consider diversifying or focusing on staple crops',
  stable: 'Market is stable - focus on crops with consistent demand'
} as const;

const SOURCE_LABELS: Record<PriceSourceName, string> = {
  'agmarknet': 'Free APIs',
  'data.gov.in': 'Free APIs',
  'krishijagran': 'Free APIs',
  'synthetic': 'Realistic Mock Data',
  'client': 'Client Supplied'
};

export function calculateMarketSentiment(increasing: number, decreasing: number, stable: number): MarketSentiment {
  const total = increasing + decreasing + stable;
  if (total === 0) {
    return 'Neutral';
  }

  const increasingPct = (increasing / total) * 100;
  const decreasingPct = (decreasing / total) * 100;

  if (increasingPct > BULLISH_THRESHOLD_PCT) {
    return 'Bullish';
  } else if (decreasingPct > BEARISH_THRESHOLD_PCT) {
    return 'Bearish';
  }
  return 'Neutral';
}

export function getMarketRecommendation(increasing: number, decreasing: number, total: number): string {
  if (increasing > total * RECOMMENDATION_SHARE) {
    return RECOMMENDATIONS.upward;
  } else if (decreasing > total * RECOMMENDATION_SHARE) {
    return RECOMMENDATIONS.declining;
  }
  return RECOMMENDATIONS.stable;
}

function snapshot(price: CommodityPrice): PerformerSnapshot {
  return {
    commodity: price.commodityName,
    price: price.currentPrice,
    trend: price.priceTrend
  };
}

// e.g. "Free APIs + Realistic Mock Data" for a batch mixing live and synthetic prices
function describeSources(prices: readonly CommodityPrice[]): string {
  const labels = new Set(prices.map(p => SOURCE_LABELS[p.source]));
  return Object.values(SOURCE_LABELS)
    .filter((label, index, all) => labels.has(label) && all.indexOf(label) === index)
    .join(' + ');
}

export class MarketAnalyzer {
  analyze(prices: readonly CommodityPrice[]): MarketSummary {
    if (prices.length === 0) {
      throw new EmptyInputError('No price data available', {
        service: 'market_analysis',
        operation: 'analyze'
      });
    }

    const trendDistribution: Record<PriceTrend, number> = { increasing: 0, decreasing: 0, stable: 0 };
    let total = 0;
    let best = prices[0];
    let worst = prices[0];

    for (const price of prices) {
      trendDistribution[price.priceTrend]++;
      total += price.currentPrice;

      // Strict comparisons keep the first occurrence on ties
      if (price.currentPrice > best.currentPrice) best = price;
      if (price.currentPrice < worst.currentPrice) worst = price;
    }

    return {
      sentiment: calculateMarketSentiment(
        trendDistribution.increasing,
        trendDistribution.decreasing,
        trendDistribution.stable
      ),
      averagePrice: roundPrice(total / prices.length),
      trendDistribution,
      bestPerforming: snapshot(best),
      worstPerforming: snapshot(worst),
      recommendation: getMarketRecommendation(trendDistribution.increasing, trendDistribution.decreasing, prices.length),
      dataSource: describeSources(prices)
    };
  }
}
