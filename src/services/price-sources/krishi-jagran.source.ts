import { type Location, isPriceTrend } from '../../types';
import { HttpPriceSource, type ParsedQuote, type SourceRequest, parsePriceValue } from './price-source';
import { isRecord } from '../../utils/type-guards';

/**
 * Krishi Jagran commodity price listing, queried by name:
 * `{ data: [{ commodity, price, market, trend }] }`.
 */
export class KrishiJagranPriceSource extends HttpPriceSource {
  readonly name = 'krishijagran' as const;

  protected buildRequest(commodity: string, location: Location): SourceRequest {
    return {
      url: this.baseUrl,
      params: { commodity, state: location.state }
    };
  }

  protected parsePayload(payload: unknown, commodity: string): ParsedQuote | null {
    const listing = isRecord(payload) ? payload.data : undefined;
    if (!Array.isArray(listing)) {
      return this.malformed('missing data list', commodity);
    }

    const wanted = commodity.toLowerCase();
    const entry = listing.filter(isRecord).find(item => {
      const name = item.commodity;
      return typeof name === 'string' && name.toLowerCase() === wanted;
    });
    if (!entry) return null;

    const { price: rawPrice, market, trend } = entry;
    const price = parsePriceValue(rawPrice);
    if (price === null) {
      return this.malformed(`invalid price ${JSON.stringify(rawPrice)}`, commodity);
    }

    return {
      price,
      market: typeof market === 'string' ? market : undefined,
      trend: isPriceTrend(trend) ? trend : 'stable'
    };
  }
}
