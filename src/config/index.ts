import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

// Load environment variables
dotenv.config();

export type FeishuDomain = 'feishu' | 'lark';

export interface Config {
  nodeEnv: string;

  // Logging
  logLevel: string;

  // Feishu connection
  feishuDomain: FeishuDomain;
  readyTimeoutMs: number;
  livenessIntervalMs: number;

  // Inbound dedup
  dedupCapacity: number;
}

/**
 * Credentials and endpoint for one Feishu app
 */
export interface FeishuCredentials {
  appId: string;
  appSecret: string;
  domain: FeishuDomain;
}

function parseDomain(value: string | undefined): FeishuDomain {
  return value?.trim().toLowerCase() === 'lark' ? 'lark' : 'feishu';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',

  // Feishu connection
  feishuDomain: parseDomain(process.env.FEISHU_DOMAIN),
  readyTimeoutMs: parsePositiveInt(process.env.FEISHU_READY_TIMEOUT_MS, 10_000),
  livenessIntervalMs: parsePositiveInt(process.env.FEISHU_LIVENESS_INTERVAL_MS, 1000),

  // Inbound dedup
  dedupCapacity: parsePositiveInt(process.env.FEISHU_DEDUP_CAPACITY, 1000),
};

/**
 * Channel settings handed over by the host's plugin manager
 */
export interface ChannelConfig {
  app_id?: string;
  app_secret?: string;
  domain?: string;
}

/**
 * Validate the host-supplied channel config and turn it into credentials.
 * Throws a ConfigurationError listing every missing field.
 */
export function resolveCredentials(channelConfig: ChannelConfig): FeishuCredentials {
  const errors: string[] = [];
  const appId = channelConfig.app_id?.trim() || '';
  const appSecret = channelConfig.app_secret?.trim() || '';

  if (!appId) {
    errors.push('app_id is required');
  }

  if (!appSecret) {
    errors.push('app_secret is required');
  }

  if (channelConfig.domain !== undefined && !['feishu', 'lark'].includes(channelConfig.domain)) {
    errors.push(`domain must be "feishu" or "lark", got "${channelConfig.domain}"`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Configuration errors:\n${errors.join('\n')}`);
  }

  return {
    appId,
    appSecret,
    domain: channelConfig.domain === undefined ? config.feishuDomain : parseDomain(channelConfig.domain),
  };
}

export default config;
