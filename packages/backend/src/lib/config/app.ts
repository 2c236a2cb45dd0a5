import { ValidationError } from '../errors.js';

export interface AppConfig {
  port: number;
  host: string;
  /** Unset means the in-memory store. */
  databaseUrl: string | null;
  jwtSecret: string;
  jwtExpiresIn: string;
  corsOrigin: string;
  logLevel: string;
  isProduction: boolean;
}

const DURATION_PATTERN = /^\d+[smhd]$/;
const MIN_SECRET_LENGTH = 16;

let cachedConfig: AppConfig | undefined;

/**
 * Read and validate the process environment.
 * Throws ValidationError listing every problem at once.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const problems: string[] = [];

  const port = parseInt(env.PORT || '3000', 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    problems.push(`PORT must be an integer between 0 and 65535, got '${env.PORT}'`);
  }

  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    problems.push('JWT_SECRET is required');
  } else if (jwtSecret.length < MIN_SECRET_LENGTH) {
    problems.push(`JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters`);
  }

  const jwtExpiresIn = env.JWT_EXPIRES_IN || '60m';
  if (!DURATION_PATTERN.test(jwtExpiresIn)) {
    problems.push(`JWT_EXPIRES_IN must look like 30s, 15m, 12h or 7d, got '${jwtExpiresIn}'`);
  }

  if (problems.length > 0 || !jwtSecret) {
    throw new ValidationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  const config: AppConfig = {
    port,
    host: env.HOST || '0.0.0.0',
    databaseUrl: env.DATABASE_URL || null,
    jwtSecret,
    jwtExpiresIn,
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:5173',
    logLevel: env.LOG_LEVEL || 'info',
    isProduction: env.NODE_ENV === 'production',
  };

  cachedConfig = config;
  return config;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetAppConfigCache(): void {
  cachedConfig = undefined;
}
