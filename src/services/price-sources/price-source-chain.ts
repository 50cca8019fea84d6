import type { CommodityPrice, Location } from '../../types';
import { ErrorHandler } from '../../utils/error-handling';
import { Logger } from '../../utils/logger';
import type { PriceSource } from './price-source';

/**
 * Tries each source in priority order and stops at the first price. A source that
 * rejects is recorded as a soft failure and the next one is tried.
 */
export class PriceSourceChain {
  private readonly logger = new Logger('PriceSourceChain');
  private readonly errorHandler = ErrorHandler.getInstance();

  constructor(private readonly sources: readonly PriceSource[]) {}

  get sourceNames(): string[] {
    return this.sources.map(source => source.name);
  }

  async attempt(commodity: string, location: Location): Promise<CommodityPrice | null> {
    for (const source of this.sources) {
      const price = await this.errorHandler.withSoftFailure(
        source.name,
        () => source.attempt(commodity, location),
        null,
        {
          service: 'price_sources',
          operation: `attempt_${source.name}`,
          metadata: { commodity, state: location.state }
        }
      );

      if (price) {
        this.logger.debug('Price resolved from source', { commodity, source: source.name });
        return price;
      }
    }

    return null;
  }
}
