import dotenv from 'dotenv';
import { isLogLevel } from './middleware/logging';

// Load environment variables
dotenv.config();

/**
 * Centralized application configuration
 *
 * Built once at startup and handed to the components that need it.
 * The root logger alone is created from LOG_LEVEL and NODE_ENV before this
 * runs; startup then applies logLevel to it.
 */

/**
 * Namecheap API access settings
 */
export interface NamecheapConfig {
  apiUser: string;
  apiKey: string;
  username: string;
  clientIp: string;
  sandbox: boolean;
  timeoutMs: number;
  baseUrl?: string;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  serverApiKey?: string;
  namecheap: NamecheapConfig;
}

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return parseInt(value, 10);
}

/**
 * Build configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const username = env.NAMECHEAP_USERNAME?.trim() || '';
  const serverApiKey = env.SERVER_API_KEY?.trim();

  const config: AppConfig = {
    port: parseInteger(env.PORT, 3000),
    host: env.HOST || '127.0.0.1',
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    serverApiKey: serverApiKey ? serverApiKey : undefined,
    namecheap: Object.freeze({
      apiUser: env.NAMECHEAP_API_USER?.trim() || username,
      apiKey: env.NAMECHEAP_API_KEY?.trim() || '',
      username,
      clientIp: env.NAMECHEAP_CLIENT_IP?.trim() || '',
      // Sandbox unless explicitly switched off
      sandbox: parseBoolean(env.NAMECHEAP_SANDBOX, true),
      timeoutMs: parseInteger(env.NAMECHEAP_TIMEOUT_MS, 30000),
      baseUrl: env.NAMECHEAP_BASE_URL?.trim() || undefined,
    }),
  };

  return Object.freeze(config);
}

/**
 * Validate configuration on startup
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!config.namecheap.apiKey) errors.push('NAMECHEAP_API_KEY is required');
  if (!config.namecheap.username) errors.push('NAMECHEAP_USERNAME is required');
  if (!config.namecheap.clientIp) errors.push('NAMECHEAP_CLIENT_IP is required');

  if (!Number.isInteger(config.namecheap.timeoutMs) || config.namecheap.timeoutMs <= 0) {
    errors.push('NAMECHEAP_TIMEOUT_MS must be a positive integer');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push('LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent');
  }

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('PORT must be an integer between 0 and 65535');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }
}
