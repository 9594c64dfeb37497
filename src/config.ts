export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  readonly version: string;
  readonly baseUrl: string;
  readonly stopQueryParam: string;
  readonly userAgent: string;
  readonly codeLength: number;
  readonly denyList: string;
  readonly apiHost: string;
  readonly apiPort: number;
  readonly refreshIntervalMs: number;
  readonly logLevel: LogLevel;
}

const DEFAULT_BASE_URL = 'http://yorkshire.acisconnect.com/Text/WebDisplay.aspx';
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 6.2; WOW64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/30.0.1599.17 Safari/537.36';
const DEFAULT_API_HOST = 'localhost';
const DEFAULT_API_PORT = 7654;

// Not configurable: the board refreshes every 30 seconds.
const REFRESH_INTERVAL_MS = 30_000;

// Characters that can never appear in a stop code.
const DENY_LIST = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ !"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

function normalizeLogLevel(value?: string): LogLevel {
  const normalized = (value ?? '').toLowerCase();
  if (normalized === 'debug' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
}

function parsePort(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (Number.isInteger(parsed) && parsed > 0 && parsed < 65536) return parsed;
  return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    version: '1.0.0',
    baseUrl: env.NEXT_BUS_BASE_URL || DEFAULT_BASE_URL,
    stopQueryParam: 'stopRef',
    userAgent: DEFAULT_USER_AGENT,
    codeLength: 8,
    denyList: DENY_LIST,
    apiHost: env.NEXT_BUS_API_HOST || DEFAULT_API_HOST,
    apiPort: parsePort(env.NEXT_BUS_API_PORT, DEFAULT_API_PORT),
    refreshIntervalMs: REFRESH_INTERVAL_MS,
    logLevel: normalizeLogLevel(env.LOG_LEVEL),
  });
}
