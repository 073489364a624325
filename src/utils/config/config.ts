import path from 'path';

export type StoreKind = 'memory' | 'file';
export type ClusterMode = 'position' | 'weekday';

export type EngineConfig = {
  port: number;
  jwtSecret: string;
  store: StoreKind;
  dataDir: string;
  defaultRegion: string;
  defaultCurrency: string;
  defaultLocale: string;
  clusterMode: ClusterMode;
  logFile: string | null;
};

/**
 * Raised when an environment setting cannot be used
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Resolved against the working directory
export const DEFAULT_DATA_DIR = path.resolve('data');

function readEnum<T extends string>(env: NodeJS.ProcessEnv, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const match = allowed.find((value) => value === raw.toLowerCase());
  if (!match) {
    throw new ConfigError(`${key} must be one of: ${allowed.join(', ')} (got '${raw}')`);
  }
  return match;
}

function readPort(env: NodeJS.ProcessEnv): number {
  const raw = env.PORT;
  if (!raw) {
    return 5002;
  }
  const port = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (isNaN(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`PORT must be a valid port number (got '${raw}')`);
  }
  return port;
}

/**
 * Builds the engine configuration from environment variables
 *
 * @param env - Environment to read, process.env by default
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    port: readPort(env),
    jwtSecret: env.JWT_SECRET || '',
    store: readEnum<StoreKind>(env, 'STORE', ['memory', 'file'], 'file'),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_DATA_DIR,
    defaultRegion: env.DEFAULT_REGION || 'US-CA',
    defaultCurrency: env.DEFAULT_CURRENCY || 'USD',
    defaultLocale: env.DEFAULT_LOCALE || 'en-US',
    clusterMode: readEnum<ClusterMode>(env, 'CLUSTER_MODE', ['position', 'weekday'], 'position'),
    logFile: env.LOG_FILE || null,
  };
}
