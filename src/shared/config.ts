import dotenv from 'dotenv';
import { ConfigurationError } from './errors';

// Load environment variables
dotenv.config();

interface SkillConfig {
  tickIntervalMs: number;
  maxConsecutiveTickErrors: number;
  isolateCallbacks: boolean;
}

interface EconomyConfig {
  startingCredits: number;
}

interface LogConfig {
  level: string;
}

export interface Config {
  nodeEnv: string;
  skills: SkillConfig;
  economy: EconomyConfig;
  logging: LogConfig;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Environment variable ${key} is required but not set`, { key });
  }
  return value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Environment variable ${key} is required but not set`, { key });
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid number`, { key, value });
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Environment variable ${key} is required but not set`, { key });
  }
  return value.toLowerCase() === 'true';
}

export const loadConfig = (): Config => ({
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
  skills: {
    tickIntervalMs: getEnvNumber('SKILL_TICK_INTERVAL_MS', 1000),
    maxConsecutiveTickErrors: getEnvNumber('SKILL_MAX_TICK_ERRORS', 0),
    isolateCallbacks: getEnvBoolean('SKILL_ISOLATE_CALLBACKS', false),
  },
  economy: {
    startingCredits: getEnvNumber('STARTING_CREDITS', 0),
  },
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
  },
});

export function validateConfig(candidate: Config): void {
  if (candidate.skills.tickIntervalMs <= 0) {
    throw new ConfigurationError('SKILL_TICK_INTERVAL_MS must be greater than zero', {
      tickIntervalMs: candidate.skills.tickIntervalMs
    });
  }

  if (candidate.skills.maxConsecutiveTickErrors < 0) {
    throw new ConfigurationError('SKILL_MAX_TICK_ERRORS must not be negative', {
      maxConsecutiveTickErrors: candidate.skills.maxConsecutiveTickErrors
    });
  }

  if (candidate.economy.startingCredits < 0) {
    throw new ConfigurationError('STARTING_CREDITS must not be negative', {
      startingCredits: candidate.economy.startingCredits
    });
  }
}

export const config: Config = loadConfig();

// Auto-validate on import
validateConfig(config);
