import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Repo root from server/src, or from dist
dotenv.config({ path: [path.resolve(__dirname, '../..', '.env'), path.resolve(__dirname, '..', '.env')] });

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid integer for ${name}: "${raw}"`);
  }
  return value;
}

function readFloatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid number for ${name}: "${raw}"`);
  }
  return value;
}

function readOptionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

const nodeEnv = process.env.NODE_ENV ?? 'development';

export const config = {
  nodeEnv,
  port: readIntEnv('PORT', 3001),
  logLevel: readOptionalEnv('LOG_LEVEL') ?? (nodeEnv === 'production' ? 'info' : 'debug'),
  corsOrigin: process.env.CORS_ORIGIN ?? 'http://localhost:5173',
  stations: {
    csvPath: readOptionalEnv('STATIONS_CSV_PATH'),
  },
  optimizer: {
    defaultMaxRangeMiles: readFloatEnv('DEFAULT_MAX_RANGE_MILES', 500),
    defaultMpg: readFloatEnv('DEFAULT_MPG', 10),
  },
  cache: {
    geocodeTtlDays: readIntEnv('GEOCODE_CACHE_TTL_DAYS', 30),
    routeResponseTtlSeconds: readIntEnv('ROUTE_CACHE_TTL_SECONDS', 60 * 60),
  },
  db: {
    host: process.env.DB_HOST ?? 'localhost',
    port: readIntEnv('DB_PORT', 5432),
    database: process.env.DB_NAME ?? 'fuel_planner',
    user: process.env.DB_USER ?? 'fuel_planner',
    // The cache tables are optional; no password means no database.
    password: readOptionalEnv('DB_PASSWORD'),
    ssl: process.env.DB_SSL === 'true',
    sslMode: process.env.DB_SSL_MODE === 'no-verify' ? 'no-verify' : 'verify',
    poolMax: readIntEnv('DB_POOL_MAX', 10),
    poolIdleTimeoutMs: readIntEnv('DB_POOL_IDLE_TIMEOUT_MS', 30_000),
    poolConnectionTimeoutMs: readIntEnv('DB_POOL_CONNECTION_TIMEOUT_MS', 5_000),
  },
  apiKeys: {
    openRouteService: readOptionalEnv('OPENROUTESERVICE_API_KEY'),
  },
  upstream: {
    timeoutMs: readIntEnv('UPSTREAM_TIMEOUT_MS', 15_000),
  },
} as const;
