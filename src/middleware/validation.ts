import type { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';

/**
 * Ends the request with 400 when any preceding express-validator chain failed.
 */
export const rejectInvalidRequest = (req: Request, res: Response, next: NextFunction): void => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      details: errors.array()
    });
    return;
  }
  next();
};

export function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' ? value : undefined;
}

export function queryNumber(req: Request, key: string): number | undefined {
  const value = queryString(req, key);
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return isFinite(parsed) ? parsed : undefined;
}

// "Rice, Wheat,,Onion" -> ['Rice', 'Wheat', 'Onion']
export function parseCommodityList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const commodities = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return commodities.length > 0 ? commodities : undefined;
}
