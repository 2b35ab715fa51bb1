import { isLogLevel, type LogLevel } from './logger.js';

export interface VcdConfig {
  baseUrl: string;
  username: string;
  password: string;
  org: string;
  apiVersion: string;
  token?: string;
  vdcHref?: string;
  verifySsl: boolean;
  timeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_API_VERSION = '37.2';
export const DEFAULT_TIMEOUT_MS = 30000;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// Load configuration from environment variables
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VcdConfig {
  const timeout = Number(env.VCD_TIMEOUT_MS);
  const logLevel = optional(env.VCD_LOG_LEVEL)?.toLowerCase() ?? 'warn';

  return {
    baseUrl: (env.VCD_BASE_URL || '').replace(/\/+$/, ''),
    username: env.VCD_USERNAME || '',
    password: env.VCD_PASSWORD || '',
    org: env.VCD_ORG || '',
    apiVersion: optional(env.VCD_API_VERSION) ?? DEFAULT_API_VERSION,
    token: optional(env.VCD_TOKEN),
    vdcHref: optional(env.VCD_VDC_HREF),
    verifySsl: env.VCD_VERIFY_SSL?.toLowerCase() === 'true',
    timeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    logLevel: isLogLevel(logLevel) ? logLevel : 'warn',
  };
}
