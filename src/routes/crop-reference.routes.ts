import { Router, type Request, type Response } from 'express';
import { param, query } from 'express-validator';
import { CropSuitabilityService } from '../services/crop-suitability.service';
import { queryNumber, queryString, rejectInvalidRequest } from '../middleware/validation';
import { SEASONS, type WeatherConditions, isSeason } from '../types';

const weatherValidation = [
  query('state').isString().withMessage('State is required').bail().trim().notEmpty().withMessage('State is required').isLength({ max: 100 }),
  query('temperature').optional().isFloat({ min: -50, max: 60 }).withMessage('Temperature must be between -50 and 60'),
  query('rainfall').optional().isFloat({ min: 0, max: 12000 }).withMessage('Rainfall must be between 0 and 12000'),
  query('humidity').optional().isFloat({ min: 0, max: 100 }).withMessage('Humidity must be between 0 and 100'),
];

const seasonValidation = [
  param('season').toUpperCase().isIn([...SEASONS]).withMessage(`Season must be one of ${SEASONS.join(', ')}`),
];

function weatherFrom(req: Request): WeatherConditions {
  return {
    temperature: queryNumber(req, 'temperature'),
    rainfall: queryNumber(req, 'rainfall'),
    humidity: queryNumber(req, 'humidity'),
  };
}

function notFound(res: Response, message: string): void {
  res.status(404).json({ success: false, error: message, code: 'NOT_FOUND' });
}

export function createCropReferenceRouter(service: CropSuitabilityService): Router {
  const router = Router();

  // GET /api/v1/crops/recommendations?state=Punjab&temperature=22
  router.get('/crops/recommendations', weatherValidation, rejectInvalidRequest, (req: Request, res: Response): void => {
    const state = queryString(req, 'state') ?? '';

    res.json({
      success: true,
      data: {
        state,
        weather: weatherFrom(req),
        rankings: service.rankCrops(state, weatherFrom(req)),
      },
    });
  });

  // GET /api/v1/crops/:crop
  router.get('/crops/:crop', (req: Request, res: Response): void => {
    const crop = service.getCropInfo(req.params.crop);
    if (!crop) {
      notFound(res, `Crop "${req.params.crop}" not found`);
      return;
    }

    res.json({ success: true, data: crop });
  });

  // GET /api/v1/crops/:crop/suitability?state=Punjab&temperature=22&rainfall=600&humidity=55
  router.get('/crops/:crop/suitability', weatherValidation, rejectInvalidRequest, (req: Request, res: Response): void => {
    const { crop } = req.params;
    if (!service.getCropInfo(crop)) {
      notFound(res, `Crop "${crop}" not found`);
      return;
    }

    const state = queryString(req, 'state') ?? '';
    const weather = weatherFrom(req);

    res.json({
      success: true,
      data: {
        crop,
        state,
        weather,
        score: service.getCropSuitability(crop, state, weather),
      },
    });
  });

  // GET /api/v1/regions/:state
  router.get('/regions/:state', (req: Request, res: Response): void => {
    const region = service.getRegionalInfo(req.params.state);
    if (!region) {
      notFound(res, `No regional data for "${req.params.state}"`);
      return;
    }

    res.json({ success: true, data: region });
  });

  // GET /api/v1/seasons/:season
  router.get('/seasons/:season', seasonValidation, rejectInvalidRequest, (req: Request, res: Response): void => {
    const season = req.params.season.toUpperCase();
    const info = isSeason(season) ? service.getSeasonInfo(season) : undefined;
    if (!info) {
      notFound(res, `No data for season "${season}"`);
      return;
    }

    res.json({ success: true, data: info });
  });

  // GET /api/v1/seasons/:season/crops
  router.get('/seasons/:season/crops', seasonValidation, rejectInvalidRequest, (req: Request, res: Response): void => {
    const season = req.params.season.toUpperCase();
    if (!isSeason(season)) {
      notFound(res, `Unknown season "${season}"`);
      return;
    }

    const crops = service.getSeasonalCrops(season);
    res.json({ success: true, data: { season, crops, count: crops.length } });
  });

  return router;
}
