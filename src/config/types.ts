export interface Config {
  // Server
  HOST: string;
  NODE_ENV: string;
  PORT: number;
  SERVICE_NAME: string;

  // Logging
  LOG_LEVEL: string;

  // Database
  DATABASE_HOST: string;
  DATABASE_PORT: number;
  DATABASE_NAME: string;
  DATABASE_USER: string;
  DATABASE_PASSWORD: string;
  DATABASE_SSL_ENABLED: boolean;
  DATABASE_SSL_CA_PATH?: string;
  DATABASE_POOL_MIN: number;
  DATABASE_POOL_MAX: number;
  DATABASE_IDLE_TIMEOUT_MS: number;
  DATABASE_CONNECTION_TIMEOUT_MS: number;
  DATABASE_STATEMENT_TIMEOUT_MS: number;
  DATABASE_QUERY_TIMEOUT_MS: number;
  DATABASE_AUTO_MIGRATE: boolean;

  // HTTP Server Timeouts
  CONNECTION_TIMEOUT_MS: number;
  REQUEST_TIMEOUT_MS: number;
  BODY_LIMIT_BYTES: number;
}
