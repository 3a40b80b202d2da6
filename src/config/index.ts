import dotenv from 'dotenv';
import type { AppConfig } from '../types/config.types';

dotenv.config();

const APP_ENVS: readonly AppConfig['env'][] = ['development', 'production', 'test'];

const appEnv: AppConfig['env'] = APP_ENVS.find((env) => env === process.env.NODE_ENV) ?? 'development';

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

const withTrailingSlash = (url: string): string => (url.endsWith('/') ? url : `${url}/`);

/**
 * Centralized configuration management
 * All environment variables and config should live here
 */
const config: AppConfig = {
  env: appEnv,
  source: {
    historyBaseUrl: withTrailingSlash(
      process.env.TRACE_HISTORY_BASE_URL || 'https://globe.adsbexchange.com/globe_history/',
    ),
    recentBaseUrl: withTrailingSlash(
      process.env.TRACE_RECENT_BASE_URL || 'https://globe.adsbexchange.com/data/',
    ),
    refererBaseUrl: withTrailingSlash(
      process.env.TRACE_REFERER_BASE_URL || 'https://globe.adsbexchange.com/',
    ),
    timeoutMs: Math.max(1000, parseNumber(process.env.TRACE_FETCH_TIMEOUT_MS, 15000)),
    concurrency: Math.max(1, Math.floor(parseNumber(process.env.TRACE_FETCH_CONCURRENCY, 4))),
  },
  legs: {
    // Older runs used 900s; either is a tuning choice.
    gapThresholdSeconds: parseNumber(process.env.LEG_GAP_THRESHOLD_SECONDS, 3600),
    filterGround: resolveBooleanFlag(
      process.env.ENABLE_GROUND_FILTER,
      process.env.DISABLE_GROUND_FILTER,
      false,
    ),
  },
  display: {
    timeZone: process.env.DISPLAY_TIMEZONE || 'UTC',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    toFiles: process.env.LOG_TO_FILES === 'true',
  },
};

export { parseNumber, resolveBooleanFlag };
export default config;
