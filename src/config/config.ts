import dotenv from 'dotenv';
import path from 'path';
import logger from '../utils/logger';

// Load environment variables
dotenv.config();

interface Config {
  NODE_ENV: string;
  PORT: number;
  CATALOG_PATH: string;
  RECOMMENDATION_TIMEOUT_MS: number;
  RATE_LIMIT_MAX: number;
  RATE_LIMIT_WINDOW_MS: number;
  TRANSLATION_CACHE_SIZE: number;
  CORS_ORIGINS: string[];
}

// Default configuration values
const defaultConfig: Config = {
  NODE_ENV: 'development',
  PORT: 5001,
  CATALOG_PATH: path.join(process.cwd(), 'data', 'coffee_clean.csv'),
  RECOMMENDATION_TIMEOUT_MS: 15000,
  RATE_LIMIT_MAX: 60,
  RATE_LIMIT_WINDOW_MS: 60 * 1000,
  TRANSLATION_CACHE_SIZE: 100,
  CORS_ORIGINS: [],
};

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// Load values from environment variables
const config: Config = {
  NODE_ENV: process.env.NODE_ENV || defaultConfig.NODE_ENV,
  PORT: parseInteger(process.env.PORT, defaultConfig.PORT),
  CATALOG_PATH: process.env.CATALOG_PATH
    ? path.resolve(process.env.CATALOG_PATH)
    : defaultConfig.CATALOG_PATH,
  RECOMMENDATION_TIMEOUT_MS: parseInteger(
    process.env.RECOMMENDATION_TIMEOUT_MS,
    defaultConfig.RECOMMENDATION_TIMEOUT_MS
  ),
  RATE_LIMIT_MAX: parseInteger(process.env.RATE_LIMIT_MAX, defaultConfig.RATE_LIMIT_MAX),
  RATE_LIMIT_WINDOW_MS: parseInteger(
    process.env.RATE_LIMIT_WINDOW_MS,
    defaultConfig.RATE_LIMIT_WINDOW_MS
  ),
  TRANSLATION_CACHE_SIZE: parseInteger(
    process.env.TRANSLATION_CACHE_SIZE,
    defaultConfig.TRANSLATION_CACHE_SIZE
  ),
  // Comma-separated; empty allows any origin
  CORS_ORIGINS: process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    : defaultConfig.CORS_ORIGINS,
};

logger.debug('🔧 Configuration loaded', {
  NODE_ENV: config.NODE_ENV,
  PORT: config.PORT,
  CATALOG_PATH: config.CATALOG_PATH,
  RECOMMENDATION_TIMEOUT_MS: config.RECOMMENDATION_TIMEOUT_MS,
});

export default config;
