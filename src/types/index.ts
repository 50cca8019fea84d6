export type PriceTrend = 'increasing' | 'decreasing' | 'stable';

export const PRICE_TRENDS: readonly PriceTrend[] = ['increasing', 'decreasing', 'stable'];

export function isPriceTrend(value: unknown): value is PriceTrend {
  return PRICE_TRENDS.some(trend => trend === value);
}

export interface Location {
  state: string;
  district?: string;
  market?: string;
}

// Price Catalog Types
export interface PriceCatalogEntry {
  commodityName: string;
  baselinePrice: number;
  trend: PriceTrend;
  knownMarkets: readonly string[];
  unit: string;
}

export type PriceCatalog = ReadonlyMap<string, PriceCatalogEntry>;

export type PriceSourceName = 'agmarknet' | 'data.gov.in' | 'krishijagran' | 'synthetic' | 'client';

export interface CommodityPrice {
  readonly commodityName: string;
  readonly currentPrice: number;
  readonly priceTrend: PriceTrend;
  readonly marketLocation: string;
  readonly observedAt: Date;
  readonly source: PriceSourceName;
}

export interface TrendPoint {
  date: string;
  price: number;
}

export interface PriceTrendSummary {
  commodity: string;
  trend: PriceTrend;
  priceHistory: TrendPoint[];
  currentPrice: number;
  priceChange: number;
  unit: string;
  source: string;
}

// Market Analysis Types
export type MarketSentiment = 'Bullish' | 'Bearish' | 'Neutral';

export interface PerformerSnapshot {
  commodity: string;
  price: number;
  trend: PriceTrend;
}

export interface MarketSummary {
  sentiment: MarketSentiment;
  averagePrice: number;
  trendDistribution: Record<PriceTrend, number>;
  bestPerforming: PerformerSnapshot;
  worstPerforming: PerformerSnapshot;
  recommendation: string;
  dataSource: string;
}

export interface MarketOverview {
  location: Location;
  prices: CommodityPrice[];
  analysis: MarketSummary;
}

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: { code: string; message: string } };

// Crop Reference Types
export type Season = 'KHARIF' | 'RABI' | 'ZAID';

export const SEASONS: readonly Season[] = ['KHARIF', 'RABI', 'ZAID'];

export type SoilType = 'ALLUVIAL' | 'BLACK' | 'RED' | 'LATERITE' | 'DESERT' | 'MOUNTAIN';

export const SOIL_TYPES: readonly SoilType[] = ['ALLUVIAL', 'BLACK', 'RED', 'LATERITE', 'DESERT', 'MOUNTAIN'];

export function isSeason(value: unknown): value is Season {
  return SEASONS.some(season => season === value);
}

export function isSoilType(value: unknown): value is SoilType {
  return SOIL_TYPES.some(soil => soil === value);
}

export type ValueRange = readonly [number, number];

export interface CropInfo {
  name: string;
  seasons: readonly Season[];
  soilTypes: readonly SoilType[];
  temperatureRange: ValueRange;
  rainfallRequirement: ValueRange;
  humidityRequirement: ValueRange;
  growthDurationDays?: number;
  waterRequirement?: string;
}

export interface RegionalInfo {
  state: string;
  soilType: SoilType;
  climate: string;
  majorCrops: readonly string[];
  irrigationCoverage: number;
  averageRainfall: number;
}

export interface SeasonInfo {
  season: Season;
  months: readonly string[];
  description: string;
  typicalRainfall: number;
  temperatureRange: ValueRange;
}

export interface WeatherConditions {
  temperature?: number;
  rainfall?: number;
  humidity?: number;
}

export interface ReferenceData {
  priceCatalog: PriceCatalog;
  crops: ReadonlyMap<string, CropInfo>;
  regions: ReadonlyMap<string, RegionalInfo>;
  seasons: ReadonlyMap<Season, SeasonInfo>;
}
