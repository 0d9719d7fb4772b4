import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface NavigatorConfig {
  cacheMaxEntries: number;
}

export interface OntologyConfig {
  dataDir?: string;
}

export interface Config {
  logging: LoggingConfig;
  navigator: NavigatorConfig;
  ontology: OntologyConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: process.env.LOG_FILE,
  },
  navigator: {
    cacheMaxEntries: getEnvVarAsNumber('NAVIGATOR_CACHE_MAX_ENTRIES', 500),
  },
  ontology: {
    dataDir: process.env.ONTOLOGY_DATA_DIR,
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
