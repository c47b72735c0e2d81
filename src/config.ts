export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const DEFAULT_BATCH_SIZE = 500;

export interface Config {
  logLevel: LogLevel;
  enableTimingLogs: boolean;
  // Calling code prepended to local phone numbers, e.g. '36'; undefined keeps them local
  phoneCountryCode?: string;
  readBatchSize: number;
  asciiOnly: boolean;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(l => l === value?.trim().toLowerCase());
  return level ?? 'info';
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Parses a positive integer, falling back when the value is absent or not a positive integer.
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return fallback;
  }
  const parsed = Number.parseInt(value.trim(), 10);
  return parsed > 0 ? parsed : fallback;
}

export function parseCountryCode(value: string | undefined): string | undefined {
  const code = value?.trim().replace(/^\+/, '');
  return code && /^\d+$/.test(code) ? code : undefined;
}

// Builds the configuration from environment variables (a .env file is loaded by the entry point)
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    enableTimingLogs: parseBoolean(env.ENABLE_TIMING_LOGS, true),
    phoneCountryCode: parseCountryCode(env.PHONE_COUNTRY_CODE),
    readBatchSize: parsePositiveInt(env.READ_BATCH_SIZE, DEFAULT_BATCH_SIZE),
    asciiOnly: parseBoolean(env.NTRIPLES_ASCII_ONLY, false),
  };
}

export const config: Config = loadConfig();
