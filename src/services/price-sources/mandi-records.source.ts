import type { Location } from '../../types';
import { HttpPriceSource, type HttpPriceSourceOptions, type ParsedQuote, type SourceRequest, parsePriceValue } from './price-source';
import { isRecord } from '../../utils/type-guards';

export interface MandiRecordsSourceOptions extends HttpPriceSourceOptions {
  apiKey: string;
}

/**
 * data.gov.in daily mandi records (`{ records: [{ commodity, market, modal_price }] }`).
 * Needs an API key; without one the source carries nothing.
 */
export class MandiRecordsPriceSource extends HttpPriceSource {
  readonly name = 'data.gov.in' as const;
  private readonly apiKey: string;

  constructor(options: MandiRecordsSourceOptions) {
    super(options);
    this.apiKey = options.apiKey;
  }

  protected buildRequest(commodity: string, location: Location): SourceRequest | null {
    if (!this.apiKey) return null;

    return {
      url: this.baseUrl,
      params: {
        'api-key': this.apiKey,
        format: 'json',
        limit: '10',
        'filters[commodity]': commodity,
        'filters[state]': location.state
      }
    };
  }

  protected parsePayload(payload: unknown, commodity: string): ParsedQuote | null {
    const records = isRecord(payload) ? payload.records : undefined;
    if (!Array.isArray(records)) {
      return this.malformed('missing records', commodity);
    }

    const record: unknown = records[0];
    if (record === undefined) return null;
    if (!isRecord(record)) {
      return this.malformed('record is not an object', commodity);
    }

    const { modal_price, market } = record;
    const price = parsePriceValue(modal_price);
    if (price === null) {
      return this.malformed(`invalid modal_price ${JSON.stringify(modal_price)}`, commodity);
    }

    return {
      price,
      market: typeof market === 'string' ? market : undefined
    };
  }
}
