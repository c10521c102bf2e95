import { clampAtLeast, resolveBooleanFlag, resolveNumber } from '../utils/config.utils';
import { resolveOptionalString, splitCsv } from '../utils/string.utils';

export const DEFAULT_API_KEY = 'change-me';
export const DEFAULT_ORDER_ID_REGEX = '^\\d{4,6}$';
export const DEFAULT_ALLOWED_PROXY_IPS = ['34.228.46.223', '34.230.166.144'];
const MIN_TIMEOUT_MS = 500;

export type LookupMode = 'commerce' | 'tracking_only';
export type CommerceOrderShape = 'search_then_detail' | 'search_inline';

export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  API_KEY: string;
  ORDER_ID_REGEX: string;
  ENFORCE_IP_ALLOWLIST: boolean;
  ALLOWED_PROXY_IPS: string[];
  LOOKUP_MODE: LookupMode;
  COMMERCE_BASE_URL: string;
  COMMERCE_APP_ID: string;
  COMMERCE_APP_SECRET: string;
  COMMERCE_TENANT: string;
  COMMERCE_TIMEOUT_MS: number;
  COMMERCE_ORDER_SHAPE: CommerceOrderShape;
  TRACKING_ENABLED: boolean;
  TRACKING_BASE_URL: string;
  TRACKING_API_KEY?: string;
  TRACKING_USER_KEY?: string;
  TRACKING_PASSWORD?: string;
  TRACKING_CUSTOMER_NO?: string;
  TRACKING_TIMEOUT_MS: number;
  SUPPORT_CONTACT: string;
}

function parseTimeout(name: string, value: unknown, fallback: number): number {
  return clampAtLeast(resolveNumber(name, value, fallback), MIN_TIMEOUT_MS);
}

function parseList(value: unknown, fallback: string[]): string[] {
  const raw = resolveOptionalString(value);
  return raw ? splitCsv(raw) : [...fallback];
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'log' ||
    value === 'info' ||
    value === 'warn' ||
    value === 'error'
  ) {
    return value;
  }

  return 'log';
}

function parseLookupMode(value: unknown): LookupMode {
  const raw = String(value ?? '').trim().toLowerCase();
  if (raw === '' || raw === 'commerce') {
    return 'commerce';
  }
  if (raw === 'tracking_only') {
    return 'tracking_only';
  }

  throw new Error(`Invalid LOOKUP_MODE: ${raw}`);
}

function parseOrderShape(value: unknown): CommerceOrderShape {
  const raw = String(value ?? '').trim().toLowerCase();
  if (raw === '' || raw === 'search_then_detail') {
    return 'search_then_detail';
  }
  if (raw === 'search_inline') {
    return 'search_inline';
  }

  throw new Error(`Invalid COMMERCE_ORDER_SHAPE: ${raw}`);
}

function parseOrderIdRegex(value: unknown): string {
  const source = resolveOptionalString(value) ?? DEFAULT_ORDER_ID_REGEX;

  try {
    new RegExp(source);
  } catch {
    throw new Error('ORDER_ID_REGEX is not a valid regular expression');
  }

  return source;
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const API_KEY = resolveOptionalString(config.API_KEY) ?? DEFAULT_API_KEY;

  if (NODE_ENV === 'production' && API_KEY === DEFAULT_API_KEY) {
    throw new Error('API_KEY must be set in production');
  }

  return {
    NODE_ENV,
    PORT: resolveNumber('PORT', config.PORT, 8080),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    API_KEY,
    ORDER_ID_REGEX: parseOrderIdRegex(config.ORDER_ID_REGEX),
    ENFORCE_IP_ALLOWLIST: resolveBooleanFlag(config.ENFORCE_IP_ALLOWLIST, true),
    ALLOWED_PROXY_IPS: parseList(config.ALLOWED_PROXY_IPS, DEFAULT_ALLOWED_PROXY_IPS),
    LOOKUP_MODE: parseLookupMode(config.LOOKUP_MODE),
    COMMERCE_BASE_URL:
      resolveOptionalString(config.COMMERCE_BASE_URL) ?? 'https://api.commerce7.com/v1',
    COMMERCE_APP_ID: resolveOptionalString(config.COMMERCE_APP_ID) ?? '',
    COMMERCE_APP_SECRET: resolveOptionalString(config.COMMERCE_APP_SECRET) ?? '',
    COMMERCE_TENANT: resolveOptionalString(config.COMMERCE_TENANT) ?? '',
    COMMERCE_TIMEOUT_MS: parseTimeout('COMMERCE_TIMEOUT_MS', config.COMMERCE_TIMEOUT_MS, 3000),
    COMMERCE_ORDER_SHAPE: parseOrderShape(config.COMMERCE_ORDER_SHAPE),
    TRACKING_ENABLED: resolveBooleanFlag(config.TRACKING_ENABLED, false),
    TRACKING_BASE_URL:
      resolveOptionalString(config.TRACKING_BASE_URL) ??
      'https://developer.wineshipping.com/api/v3.1',
    TRACKING_API_KEY: resolveOptionalString(config.TRACKING_API_KEY),
    TRACKING_USER_KEY: resolveOptionalString(config.TRACKING_USER_KEY),
    TRACKING_PASSWORD: resolveOptionalString(config.TRACKING_PASSWORD),
    TRACKING_CUSTOMER_NO: resolveOptionalString(config.TRACKING_CUSTOMER_NO),
    TRACKING_TIMEOUT_MS: parseTimeout('TRACKING_TIMEOUT_MS', config.TRACKING_TIMEOUT_MS, 3000),
    SUPPORT_CONTACT: resolveOptionalString(config.SUPPORT_CONTACT) ?? 'support',
  };
}
