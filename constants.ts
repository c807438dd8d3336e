import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LogLevel, SearchBounds } from './types';

// Tolerances used when a caller gives none (flat entry point, SABIO-RK records)
export const DEFAULT_PH_SIGMA = 1.0;
export const DEFAULT_TEMP_SIGMA = 5.0;
export const DEFAULT_OPTIMAL_PH = 7.0;
export const DEFAULT_OPTIMAL_TEMP = 37.0;

export const DEFAULT_SEARCH_BOUNDS: SearchBounds = {
  substrate_conc: [0.01, 10.0],
  pH: [4.0, 9.0],
  temp: [20.0, 60.0],
};

export const SABIO_BASE_URL = 'https://sabiork.h-its.org/sabioRestWebServices/kineticLaws';

export const BUNDLED_DATA_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  'data',
  'enzyme_data.json',
);

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error', 'silent'];
export const DEFAULT_LOG_LEVEL: LogLevel = 'warning';

export interface AppConfig {
  dataPath: string;
  logLevel: LogLevel;
  sabioBaseUrl: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve runtime configuration from environment variables.
 *
 *   ENZYME_DATA_PATH   dataset used by getEnzymeKinetics()
 *   ENZYME_LOG_LEVEL   debug | info | warning | error | silent
 *   SABIO_BASE_URL     kinetic-laws endpoint
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = env.ENZYME_LOG_LEVEL?.trim().toLowerCase() ?? '';
  return {
    dataPath: env.ENZYME_DATA_PATH ? path.resolve(env.ENZYME_DATA_PATH) : BUNDLED_DATA_PATH,
    logLevel: isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
    sabioBaseUrl: env.SABIO_BASE_URL || SABIO_BASE_URL,
  };
}
