import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { CommodityPrice, Location, PriceSourceName, PriceTrend } from '../../types';
import { CircuitBreaker, type CircuitBreakerStats } from '../../utils/circuit-breaker';
import { type ErrorContext, SourceUnavailableError } from '../../utils/error-handling';
import { Logger } from '../../utils/logger';

/**
 * A provider of live commodity prices. `attempt` resolves to null when the source
 * has nothing for the commodity and rejects when the source itself failed.
 */
export interface PriceSource {
  readonly name: PriceSourceName;
  attempt(commodity: string, location: Location): Promise<CommodityPrice | null>;
}

export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
}

export interface SourceRequest {
  url: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface ParsedQuote {
  price: number;
  market?: string;
  trend?: PriceTrend;
}

export interface HttpPriceSourceOptions {
  baseUrl: string;
  timeoutMs: number;
  httpClient?: HttpClient;
  circuitBreaker?: CircuitBreaker;
  now?: () => Date;
}

export function parsePriceValue(value: unknown): number | null {
  const price = typeof value === 'string' ? parseFloat(value) : value;
  if (typeof price !== 'number' || !isFinite(price) || price < 0) {
    return null;
  }
  return price;
}

export abstract class HttpPriceSource implements PriceSource {
  abstract readonly name: PriceSourceName;

  protected readonly baseUrl: string;
  protected readonly timeoutMs: number;
  protected readonly http: HttpClient;
  protected readonly circuitBreaker: CircuitBreaker;
  protected readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: HttpPriceSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.http = options.httpClient ?? axios.create();
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker();
    this.now = options.now ?? (() => new Date());
    this.logger = new Logger(`PriceSource:${this.constructor.name}`);
  }

  /**
   * Request for the commodity, or null when this source does not carry it.
   */
  protected abstract buildRequest(commodity: string, location: Location): SourceRequest | null;

  /**
   * Extracts the quote from a 200 response. Returns null when the payload is well
   * formed but holds no price; throws through `malformed` otherwise.
   */
  protected abstract parsePayload(payload: unknown, commodity: string, location: Location): ParsedQuote | null;

  async attempt(commodity: string, location: Location): Promise<CommodityPrice | null> {
    const request = this.buildRequest(commodity, location);
    if (!request) {
      this.logger.debug('No source mapping for commodity', { commodity });
      return null;
    }

    if (this.circuitBreaker.isOpen()) {
      this.logger.debug('Circuit open, skipping source', { commodity });
      return null;
    }

    const context: ErrorContext = {
      service: 'price_sources',
      operation: `fetch_${this.name}`,
      metadata: { commodity, state: location.state }
    };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get(request.url, {
        params: request.params,
        headers: request.headers,
        timeout: this.timeoutMs,
        validateStatus: () => true
      });
    } catch (error) {
      this.circuitBreaker.recordFailure();
      const reason = axios.isAxiosError(error) && error.code === 'ECONNABORTED'
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(this.name, reason, context, error instanceof Error ? error : undefined);
    }

    if (response.status !== 200) {
      this.circuitBreaker.recordFailure();
      throw new SourceUnavailableError(this.name, `HTTP ${response.status}`, context);
    }

    let quote: ParsedQuote | null;
    try {
      quote = this.parsePayload(response.data, commodity, location);
    } catch (error) {
      this.circuitBreaker.recordFailure();
      throw error instanceof SourceUnavailableError
        ? error
        : new SourceUnavailableError(this.name, 'malformed payload', context, error instanceof Error ? error : undefined);
    }

    this.circuitBreaker.recordSuccess();
    if (!quote) {
      return null;
    }

    return Object.freeze({
      commodityName: commodity,
      currentPrice: quote.price,
      priceTrend: quote.trend ?? 'stable',
      marketLocation: quote.market || location.state,
      observedAt: this.now(),
      source: this.name
    });
  }

  protected malformed(reason: string, commodity: string): never {
    throw new SourceUnavailableError(this.name, `malformed payload: ${reason}`, {
      service: 'price_sources',
      operation: `parse_${this.name}`,
      metadata: { commodity }
    });
  }

  getHealth(): CircuitBreakerStats {
    return this.circuitBreaker.getStats();
  }
}
