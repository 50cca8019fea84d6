import { Router, type Request, type Response, type NextFunction } from 'express';
import { query, body } from 'express-validator';
import { CommodityPriceService } from '../services/commodity-price.service';
import { statusForErrorCode } from '../middleware/security';
import { parseCommodityList, queryNumber, queryString, rejectInvalidRequest } from '../middleware/validation';
import { type CommodityPrice, PRICE_TRENDS, isPriceTrend } from '../types';
import { isRecord } from '../utils/type-guards';

const MAX_COMMODITIES = 50;

// Repeated query keys arrive as arrays; each field must be given once.
const locationValidation = [
  query('state').isString().withMessage('State is required').bail().trim().notEmpty().withMessage('State is required').isLength({ max: 100 }),
  query('district').optional().isString().withMessage('District must be given once').bail().isLength({ max: 100 }).withMessage('District too long'),
  query('commodities').optional().isString().withMessage('Commodities must be given once').bail()
    .isLength({ max: 2000 }).withMessage('Commodity list too long')
    .custom((value: string) => (parseCommodityList(value)?.length ?? 0) <= MAX_COMMODITIES)
    .withMessage(`At most ${MAX_COMMODITIES} commodities per request`),
];

const trendValidation = [
  query('commodity').isString().withMessage('Commodity is required').bail().trim().notEmpty().withMessage('Commodity is required').isLength({ max: 100 }),
  query('days').optional().isInt({ min: 1, max: 365 }).withMessage('Days must be between 1 and 365'),
];

const analysisValidation = [
  body('prices').isArray({ max: 500 }).withMessage('prices must be an array'),
  body('prices.*.commodityName').isString().trim().notEmpty().withMessage('commodityName is required'),
  body('prices.*.currentPrice').isFloat({ min: 0 }).withMessage('currentPrice must be a non-negative number'),
  body('prices.*.priceTrend').isIn([...PRICE_TRENDS]).withMessage(`priceTrend must be one of ${PRICE_TRENDS.join(', ')}`),
  body('prices.*.marketLocation').optional().isString().isLength({ max: 100 }),
  body('prices.*.observedAt').optional().isISO8601().withMessage('observedAt must be an ISO 8601 date'),
];

function toClientPrice(raw: unknown): CommodityPrice | null {
  if (!isRecord(raw)) return null;

  const { commodityName, currentPrice, priceTrend, marketLocation, observedAt } = raw;
  const price = typeof currentPrice === 'string' ? Number(currentPrice) : currentPrice;
  if (typeof commodityName !== 'string' || typeof price !== 'number' || !isFinite(price) || !isPriceTrend(priceTrend)) {
    return null;
  }

  return Object.freeze({
    commodityName,
    currentPrice: price,
    priceTrend,
    marketLocation: typeof marketLocation === 'string' ? marketLocation : 'Unknown',
    observedAt: typeof observedAt === 'string' ? new Date(observedAt) : new Date(),
    source: 'client' as const
  });
}

export function createCommodityPriceRouter(service: CommodityPriceService): Router {
  const router = Router();

  // GET /api/v1/commodity-prices?state=Punjab&commodities=Rice,Wheat
  router.get('/', locationValidation, rejectInvalidRequest, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const state = queryString(req, 'state') ?? '';
      const commodities = parseCommodityList(queryString(req, 'commodities'));
      const prices = await service.getPrices({ state, district: queryString(req, 'district') }, commodities);

      res.json({
        success: true,
        data: prices,
        total: prices.length
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/commodity-prices/commodities
  router.get('/commodities', (_req: Request, res: Response): void => {
    const commodities = service.listCommodities();

    res.json({
      success: true,
      data: {
        commodities,
        count: commodities.length
      }
    });
  });

  // GET /api/v1/commodity-prices/trends?commodity=Wheat&days=30
  router.get('/trends', trendValidation, rejectInvalidRequest, (req: Request, res: Response): void => {
    const commodity = queryString(req, 'commodity') ?? '';
    const days = queryNumber(req, 'days');

    const result = service.getPriceTrends(commodity, days);
    if (!result.success) {
      res.status(statusForErrorCode(result.error.code)).json({
        success: false,
        error: result.error.message,
        code: result.error.code
      });
      return;
    }

    res.json({ success: true, data: result.data });
  });

  // GET /api/v1/commodity-prices/analysis?state=Punjab
  router.get('/analysis', locationValidation, rejectInvalidRequest, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const state = queryString(req, 'state') ?? '';
      const commodities = parseCommodityList(queryString(req, 'commodities'));

      const result = await service.getMarketOverview({ state, district: queryString(req, 'district') }, commodities);
      if (!result.success) {
        res.status(statusForErrorCode(result.error.code)).json({
          success: false,
          error: result.error.message,
          code: result.error.code
        });
        return;
      }

      res.json({ success: true, data: result.data });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/commodity-prices/analysis  { prices: CommodityPrice[] }
  router.post('/analysis', analysisValidation, rejectInvalidRequest, (req: Request, res: Response): void => {
    const rawPrices: unknown[] = Array.isArray(req.body.prices) ? req.body.prices : [];
    const prices = rawPrices.map(toClientPrice).filter((price): price is CommodityPrice => price !== null);

    const result = service.getMarketAnalysis(prices);
    if (!result.success) {
      res.status(statusForErrorCode(result.error.code)).json({
        success: false,
        error: result.error.message,
        code: result.error.code
      });
      return;
    }

    res.json({ success: true, data: result.data });
  });

  return router;
}
