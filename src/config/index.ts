import * as dotenv from 'dotenv';
import { Config } from './types';

// Load environment variables
dotenv.config();

export function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${name} is required`);
  }
  return value;
}

export function getEnvNumber(name: string, defaultValue?: number): number {
  const value = process.env[name];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${name} is required`);
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${name} must be a number`);
  }
  return num;
}

export function getEnvBoolean(name: string, defaultValue?: boolean): boolean {
  const value = process.env[name];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${name} is required`);
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  throw new Error(`Environment variable ${name} must be a boolean`);
}

const sslCaPath = process.env['DATABASE_SSL_CA_PATH'];

export const config: Config = {
  // Server
  HOST: getEnvVar('HOST', '0.0.0.0'),
  NODE_ENV: getEnvVar('NODE_ENV', 'development'),
  PORT: getEnvNumber('PORT', 3000),
  SERVICE_NAME: getEnvVar('SERVICE_NAME', 'teaching-data-service'),

  // Logging
  LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),

  // Database
  DATABASE_HOST: getEnvVar('DATABASE_HOST', 'localhost'),
  DATABASE_PORT: getEnvNumber('DATABASE_PORT', 5432),
  DATABASE_NAME: getEnvVar('DATABASE_NAME', 'teaching_db'),
  DATABASE_USER: getEnvVar('DATABASE_USER', 'postgres'),
  DATABASE_PASSWORD: getEnvVar('DATABASE_PASSWORD', 'postgres'),
  DATABASE_SSL_ENABLED: getEnvBoolean('DATABASE_SSL_ENABLED', false),
  ...(sslCaPath && { DATABASE_SSL_CA_PATH: sslCaPath }),
  DATABASE_POOL_MIN: getEnvNumber('DATABASE_POOL_MIN', 2),
  DATABASE_POOL_MAX: getEnvNumber('DATABASE_POOL_MAX', 10),
  DATABASE_IDLE_TIMEOUT_MS: getEnvNumber('DATABASE_IDLE_TIMEOUT_MS', 30000),
  DATABASE_CONNECTION_TIMEOUT_MS: getEnvNumber(
    'DATABASE_CONNECTION_TIMEOUT_MS',
    30000
  ),
  DATABASE_STATEMENT_TIMEOUT_MS: getEnvNumber(
    'DATABASE_STATEMENT_TIMEOUT_MS',
    5000
  ),
  DATABASE_QUERY_TIMEOUT_MS: getEnvNumber('DATABASE_QUERY_TIMEOUT_MS', 10000),
  DATABASE_AUTO_MIGRATE: getEnvBoolean('DATABASE_AUTO_MIGRATE', true),

  // HTTP Server Timeouts
  CONNECTION_TIMEOUT_MS: getEnvNumber('CONNECTION_TIMEOUT_MS', 30000), // 30 seconds
  REQUEST_TIMEOUT_MS: getEnvNumber('REQUEST_TIMEOUT_MS', 60000), // 60 seconds
  BODY_LIMIT_BYTES: getEnvNumber('BODY_LIMIT_BYTES', 1048576), // 1 MB
};
