import dotenv from 'dotenv';
import path from 'path';
import type { LogLevel } from '../utils/logger';

dotenv.config();

const dataDir = path.resolve(__dirname, '../../data');

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

function parseSeed(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const seed = parseInt(value, 10);
  return isNaN(seed) ? undefined : seed;
}

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3000', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
  },

  data: {
    priceCatalogPath: process.env.PRICE_CATALOG_PATH || path.join(dataDir, 'mock_prices.json'),
    cropDataPath: process.env.CROP_DATA_PATH || path.join(dataDir, 'crop_data.json'),
    regionalDataPath: process.env.REGIONAL_DATA_PATH || path.join(dataDir, 'regional_data.json'),
    seasonalDataPath: process.env.SEASONAL_DATA_PATH || path.join(dataDir, 'seasonal_data.json'),
  },

  priceSources: {
    enabled: (process.env.EXTERNAL_PRICE_SOURCES_ENABLED || 'true') !== 'false',
    timeoutMs: parseInt(process.env.PRICE_SOURCE_TIMEOUT_MS || '10000', 10),
    agmarknetBaseUrl: process.env.AGMARKNET_BASE_URL || 'https://agmarknet.gov.in/api/price/commodity',
    mandiApiBaseUrl: process.env.MANDI_API_BASE_URL || 'https://api.data.gov.in/resource/9ef84268-d588-465a-a308-a864a43d0070',
    mandiApiKey: process.env.MANDI_API_KEY || '',
    krishiJagranBaseUrl: process.env.KRISHI_JAGRAN_BASE_URL || 'https://www.krishijagran.com/api/commodity-prices',
    randomSeed: parseSeed(process.env.PRICE_RANDOM_SEED),
  },

  security: {
    rateLimitWindowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    rateLimitMaxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10),
    corsAllowedOrigins: (process.env.CORS_ALLOWED_ORIGINS || '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
  },

  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
  },
};

export function validateEnvironment(): string[] {
  const warnings: string[] = [];

  if (config.priceSources.enabled && !config.priceSources.mandiApiKey) {
    warnings.push('MANDI_API_KEY is not set; the data.gov.in mandi source will be skipped.');
  }

  if (isNaN(config.priceSources.timeoutMs) || config.priceSources.timeoutMs <= 0) {
    throw new Error(`PRICE_SOURCE_TIMEOUT_MS must be a positive integer, got "${process.env.PRICE_SOURCE_TIMEOUT_MS}"`);
  }

  if (isNaN(config.server.port)) {
    throw new Error(`PORT must be an integer, got "${process.env.PORT}"`);
  }

  return warnings;
}
