import { readFileSync } from 'fs';
import { config } from './environment';
import {
  type CropInfo,
  type PriceCatalog,
  type PriceCatalogEntry,
  type ReferenceData,
  type RegionalInfo,
  type Season,
  type SeasonInfo,
  type ValueRange,
  isPriceTrend,
  isSeason,
  isSoilType
} from '../types';
import { ConfigLoadError, ErrorHandler, toError } from '../utils/error-handling';
import { Logger } from '../utils/logger';
import { isFiniteNumber, isRecord, isStringArray } from '../utils/type-guards';

const logger = new Logger('ReferenceData');

type JsonObject = Record<string, unknown>;

function parseRange(value: unknown): ValueRange | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [min, max] = value;
  if (!isFiniteNumber(min) || !isFiniteNumber(max) || min > max) return null;
  return [min, max];
}

/**
 * Reads a JSON object from disk. A missing or corrupt file is recorded as a
 * ConfigLoadError and yields null.
 */
function readJsonTable(filePath: string, table: string): JsonObject | null {
  const context = { service: 'reference_data', operation: `load_${table}`, metadata: { filePath } };

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    if (!isRecord(parsed)) {
      throw new Error(`expected a JSON object at the top level of ${table}`);
    }
    return parsed;
  } catch (error) {
    ErrorHandler.getInstance().recordError(new ConfigLoadError(filePath, context, toError(error)));
    return null;
  }
}

function skipEntry(table: string, key: string, reason: string): void {
  logger.warn(`Skipping invalid ${table} entry`, { key, reason });
}

export function parsePriceCatalogEntry(commodityName: string, raw: unknown): PriceCatalogEntry | null {
  if (!isRecord(raw)) return null;

  const { current_price, trend, markets, unit } = raw;
  if (!isFiniteNumber(current_price) || current_price <= 0) return null;
  if (!isPriceTrend(trend)) return null;

  return Object.freeze({
    commodityName,
    baselinePrice: current_price,
    trend,
    knownMarkets: Object.freeze(isStringArray(markets) ? [...markets] : []),
    unit: typeof unit === 'string' && unit.length > 0 ? unit : 'quintal'
  });
}

export function loadPriceCatalog(filePath: string = config.data.priceCatalogPath): PriceCatalog {
  const table = readJsonTable(filePath, 'price_catalog');
  const catalog = new Map<string, PriceCatalogEntry>();
  if (!table) return catalog;

  for (const [commodity, raw] of Object.entries(table)) {
    const entry = parsePriceCatalogEntry(commodity, raw);
    if (entry) {
      catalog.set(commodity, entry);
    } else {
      skipEntry('price_catalog', commodity, 'baseline price must be positive and trend one of increasing, decreasing, stable');
    }
  }

  logger.info('Price catalog loaded', { commodities: catalog.size, filePath });
  return catalog;
}

function parseCropInfo(name: string, raw: unknown): CropInfo | null {
  if (!isRecord(raw)) return null;

  const temperatureRange = parseRange(raw.temperature_range);
  const rainfallRequirement = parseRange(raw.rainfall_requirement);
  const humidityRequirement = parseRange(raw.humidity_requirement);
  if (!temperatureRange || !rainfallRequirement || !humidityRequirement) return null;

  const { seasons, soil_types, growth_duration, water_requirement } = raw;
  const seasonNames = isStringArray(seasons) ? seasons : [];
  const soilNames = isStringArray(soil_types) ? soil_types : [];
  if (!seasonNames.every(isSeason) || !soilNames.every(isSoilType)) return null;

  return Object.freeze({
    name,
    seasons: Object.freeze(seasonNames.filter(isSeason)),
    soilTypes: Object.freeze(soilNames.filter(isSoilType)),
    temperatureRange,
    rainfallRequirement,
    humidityRequirement,
    growthDurationDays: isFiniteNumber(growth_duration) ? growth_duration : undefined,
    waterRequirement: typeof water_requirement === 'string' ? water_requirement : undefined
  });
}

export function loadCropData(filePath: string = config.data.cropDataPath): ReadonlyMap<string, CropInfo> {
  const table = readJsonTable(filePath, 'crop_data');
  const crops = new Map<string, CropInfo>();
  if (!table) return crops;

  for (const [name, raw] of Object.entries(table)) {
    const crop = parseCropInfo(name, raw);
    if (crop) {
      crops.set(name, crop);
    } else {
      skipEntry('crop_data', name, 'ranges, seasons or soil types are malformed');
    }
  }

  return crops;
}

export function loadRegionalData(filePath: string = config.data.regionalDataPath): ReadonlyMap<string, RegionalInfo> {
  const table = readJsonTable(filePath, 'regional_data');
  const regions = new Map<string, RegionalInfo>();
  if (!table) return regions;

  for (const [state, raw] of Object.entries(table)) {
    if (!isRecord(raw)) {
      skipEntry('regional_data', state, 'entry is not an object');
      continue;
    }

    const { soil_type, climate, major_crops, irrigation_coverage, average_rainfall } = raw;
    if (!isSoilType(soil_type) || !isStringArray(major_crops)) {
      skipEntry('regional_data', state, 'soil type or major crops are malformed');
      continue;
    }

    regions.set(state, Object.freeze({
      state,
      soilType: soil_type,
      climate: typeof climate === 'string' ? climate : 'Unknown',
      majorCrops: Object.freeze([...major_crops]),
      irrigationCoverage: isFiniteNumber(irrigation_coverage) ? irrigation_coverage : 0,
      averageRainfall: isFiniteNumber(average_rainfall) ? average_rainfall : 0
    }));
  }

  return regions;
}

export function loadSeasonalData(filePath: string = config.data.seasonalDataPath): ReadonlyMap<Season, SeasonInfo> {
  const table = readJsonTable(filePath, 'seasonal_data');
  const seasons = new Map<Season, SeasonInfo>();
  if (!table) return seasons;

  for (const [season, raw] of Object.entries(table)) {
    if (!isSeason(season) || !isRecord(raw)) {
      skipEntry('seasonal_data', season, 'unknown season or entry is not an object');
      continue;
    }

    const { months, description, typical_rainfall, temperature_range } = raw;
    const temperatureRange = parseRange(temperature_range);
    if (!temperatureRange) {
      skipEntry('seasonal_data', season, 'malformed temperature range');
      continue;
    }

    seasons.set(season, Object.freeze({
      season,
      months: Object.freeze(isStringArray(months) ? [...months] : []),
      description: typeof description === 'string' ? description : '',
      typicalRainfall: isFiniteNumber(typical_rainfall) ? typical_rainfall : 0,
      temperatureRange
    }));
  }

  return seasons;
}

export function loadReferenceData(paths: Partial<typeof config.data> = {}): ReferenceData {
  const resolved = { ...config.data, ...paths };

  return Object.freeze({
    priceCatalog: loadPriceCatalog(resolved.priceCatalogPath),
    crops: loadCropData(resolved.cropDataPath),
    regions: loadRegionalData(resolved.regionalDataPath),
    seasons: loadSeasonalData(resolved.seasonalDataPath)
  });
}
