import express, { type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import { config } from './config/environment';
import { loadReferenceData } from './config/reference-data';
import { securityMiddleware, errorHandler, notFoundHandler } from './middleware/security';
import { API_VERSION, type ApiServices, SERVICE_NAME, createApiRouter } from './routes';
import { CommodityPriceService } from './services/commodity-price.service';
import { CropSuitabilityService } from './services/crop-suitability.service';
import { MarketAnalyzer } from './services/market-analyzer';
import { MarketResolver } from './services/market-resolver';
import { PriceSourceChain, createDefaultPriceSources } from './services/price-sources';
import type { PriceSource } from './services/price-sources/price-source';
import { SyntheticPriceGenerator } from './services/synthetic-price.generator';
import type { ReferenceData } from './types';
import { ErrorHandler } from './utils/error-handling';
import { Logger } from './utils/logger';
import { type RandomSource, createRandomSource } from './utils/random';

export interface ServiceOptions {
  sources?: PriceSource[];
  random?: RandomSource;
  now?: () => Date;
}

/**
 * Wires the price pipeline and crop reference services over one set of
 * read-only reference tables.
 */
export function createServices(referenceData: ReferenceData, options: ServiceOptions = {}): ApiServices {
  const marketResolver = new MarketResolver();
  const generator = new SyntheticPriceGenerator(referenceData.priceCatalog, {
    random: options.random ?? createRandomSource(config.priceSources.randomSeed),
    now: options.now,
    marketResolver
  });

  return {
    commodityPrices: new CommodityPriceService({
      catalog: referenceData.priceCatalog,
      sourceChain: new PriceSourceChain(options.sources ?? createDefaultPriceSources()),
      generator,
      analyzer: new MarketAnalyzer()
    }),
    cropSuitability: new CropSuitabilityService({
      crops: referenceData.crops,
      regions: referenceData.regions,
      seasons: referenceData.seasons
    })
  };
}

export class App {
  public app: express.Application;
  private logger: Logger;

  constructor(services: ApiServices = createServices(loadReferenceData())) {
    this.app = express();
    this.logger = new Logger('App');

    this.initializeMiddleware();
    this.initializeRoutes(services);
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();

      res.on('finish', () => {
        this.logger.debug('Request completed', {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: `${Date.now() - startTime}ms`
        });
      });

      next();
    });

    if (config.server.nodeEnv !== 'test') {
      this.app.use(morgan('combined', {
        stream: {
          write: (message: string) => {
            this.logger.info('HTTP Request', { message: message.trim() });
          }
        }
      }));
    }

    this.app.use(securityMiddleware);
    this.app.use(express.json({ limit: '1mb' }));
  }

  private initializeRoutes(services: ApiServices): void {
    this.app.get('/', (_req, res) => {
      res.json({
        message: `Welcome to ${SERVICE_NAME}`,
        version: API_VERSION,
        documentation: '/api/v1/health'
      });
    });

    this.app.get('/errors', (_req, res) => {
      res.json(ErrorHandler.getInstance().getErrorStats());
    });

    this.app.use('/api/v1', createApiRouter(services));
  }

  private initializeErrorHandling(): void {
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }
}
