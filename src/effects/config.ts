import path from 'node:path';
import {LogLevel} from '../types';
import {StorefrontConfig} from './types';

export const DEFAULT_SEED_PATH = path.join(__dirname, '..', '..', 'seed', 'catalog.json');

const logLevels: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  return logLevels.find(level => level === value?.trim().toLowerCase()) ?? 'warn';
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StorefrontConfig {
  return {
    seedPath: env.CATALOG_SEED_PATH || DEFAULT_SEED_PATH,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
