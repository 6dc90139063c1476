export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  sessionTtlMinutes: number;
  maxQuantity: number;
  currency: string;
  enableDebugRoutes: boolean;
  corsOrigin?: string[];
  apiBaseUrl?: string;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
}

// unset or non-numeric values fall back to the default
function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseIntOr(env.PORT, 3000);
  const host = env.HOST || '0.0.0.0';
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    port,
    host,
    nodeEnv,
    logLevel: env.LOG_LEVEL || 'info',
    sessionTtlMinutes: parseIntOr(env.SESSION_TTL_MINUTES, 30),
    maxQuantity: parseIntOr(env.MAX_QUANTITY, 99),
    currency: env.CURRENCY || 'Rs',
    // raw cart dump stays off in production unless asked for
    enableDebugRoutes: env.ENABLE_DEBUG_ROUTES
      ? env.ENABLE_DEBUG_ROUTES === 'true'
      : nodeEnv !== 'production',
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : undefined,
    apiBaseUrl: env.API_BASE_URL,
    apiTitle: env.API_TITLE || 'Simple Shop Cart API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription: env.API_DESCRIPTION || 'Menu-driven demo shop: a fixed catalog and a per-session cart',
  };
}
