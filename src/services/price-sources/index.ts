import { config } from '../../config/environment';
import { CircuitBreaker } from '../../utils/circuit-breaker';
import { AgmarknetPriceSource } from './agmarknet.source';
import { KrishiJagranPriceSource } from './krishi-jagran.source';
import { MandiRecordsPriceSource } from './mandi-records.source';
import type { HttpClient, PriceSource } from './price-source';

export { AgmarknetPriceSource, AGMARKNET_COMMODITY_CODES } from './agmarknet.source';
export { KrishiJagranPriceSource } from './krishi-jagran.source';
export { MandiRecordsPriceSource } from './mandi-records.source';
export { HttpPriceSource, parsePriceValue } from './price-source';
export type { HttpClient, HttpPriceSourceOptions, ParsedQuote, PriceSource, SourceRequest } from './price-source';
export { PriceSourceChain } from './price-source-chain';

/**
 * Sources in priority order: the government feed first, then the secondary ones.
 */
export function createDefaultPriceSources(
  settings: typeof config.priceSources = config.priceSources,
  httpClient?: HttpClient
): PriceSource[] {
  if (!settings.enabled) {
    return [];
  }

  const common = { timeoutMs: settings.timeoutMs, httpClient };

  return [
    new AgmarknetPriceSource({ ...common, baseUrl: settings.agmarknetBaseUrl, circuitBreaker: new CircuitBreaker() }),
    new MandiRecordsPriceSource({
      ...common,
      baseUrl: settings.mandiApiBaseUrl,
      apiKey: settings.mandiApiKey,
      circuitBreaker: new CircuitBreaker()
    }),
    new KrishiJagranPriceSource({ ...common, baseUrl: settings.krishiJagranBaseUrl, circuitBreaker: new CircuitBreaker() })
  ];
}
