import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * Parse a boolean flag from environment variable
 * Accepts 'true' / '1' / 'yes' (case-insensitive), anything else is false
 */
const parseFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '8000'),
  nodeEnv,
  storeName: process.env.STORE_NAME || 'MC HEROS',
  logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  logToFile: parseFlag(process.env.LOG_TO_FILE, nodeEnv !== 'test'),
};

export interface DatabaseConfig {
  url: string;
  name: string;
  maxRetries: number;
  retryDelay: number;
}

export const dbConfig: DatabaseConfig = {
  url: process.env.DATABASE_URL || '',
  name: process.env.DATABASE_NAME || '',
  maxRetries: parseInt(process.env.DATABASE_MAX_RETRIES || '10'),
  retryDelay: parseInt(process.env.DATABASE_RETRY_DELAY || '2000'), // ms
};
