import { HttpPriceSource, type ParsedQuote, type SourceRequest, parsePriceValue } from './price-source';
import { isRecord } from '../../utils/type-guards';

// Agmarknet commodity codes
export const AGMARKNET_COMMODITY_CODES: Readonly<Record<string, string>> = Object.freeze({
  'Rice': '1101',
  'Wheat': '1102',
  'Maize': '1103',
  'Sugarcane': '1104',
  'Cotton': '1105',
  'Soybean': '1106',
  'Groundnut': '1107',
  'Potato': '1108',
  'Onion': '1109',
  'Tomato': '1110'
});

/**
 * Government of India Agmarknet price feed. Responds with
 * `{ price: [{ price, market }] }`, newest first.
 */
export class AgmarknetPriceSource extends HttpPriceSource {
  readonly name = 'agmarknet' as const;

  protected buildRequest(commodity: string): SourceRequest | null {
    if (!Object.prototype.hasOwnProperty.call(AGMARKNET_COMMODITY_CODES, commodity)) return null;

    return { url: `${this.baseUrl}/${AGMARKNET_COMMODITY_CODES[commodity]}` };
  }

  protected parsePayload(payload: unknown, commodity: string): ParsedQuote | null {
    const prices = isRecord(payload) ? payload.price : undefined;
    if (!Array.isArray(prices)) {
      return this.malformed('missing price list', commodity);
    }

    const latest: unknown = prices[0];
    if (latest === undefined) return null;
    if (!isRecord(latest)) {
      return this.malformed('price entry is not an object', commodity);
    }

    const { price: rawPrice, market } = latest;
    const price = parsePriceValue(rawPrice);
    if (price === null) {
      return this.malformed(`invalid price ${JSON.stringify(rawPrice)}`, commodity);
    }

    return {
      price,
      market: typeof market === 'string' ? market : undefined,
      // A single quote carries no history to derive a direction from
      trend: 'stable'
    };
  }
}
