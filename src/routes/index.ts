import { Router } from 'express';
import { CommodityPriceService } from '../services/commodity-price.service';
import { CropSuitabilityService } from '../services/crop-suitability.service';
import { createCommodityPriceRouter } from './commodity-prices.routes';
import { createCropReferenceRouter } from './crop-reference.routes';

export interface ApiServices {
  commodityPrices: CommodityPriceService;
  cropSuitability: CropSuitabilityService;
}

export const SERVICE_NAME = 'Mandi Price Insights API';
export const API_VERSION = '1.0.0';

export function createApiRouter(services: ApiServices): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: API_VERSION,
      commodities: services.commodityPrices.listCommodities().length,
    });
  });

  router.use('/commodity-prices', createCommodityPriceRouter(services.commodityPrices));
  router.use('/', createCropReferenceRouter(services.cropSuitability));

  return router;
}
