import { registerAs } from '@nestjs/config';
import {
  validateEnv,
  type AppEnv,
  type CommerceOrderShape,
  type LookupMode,
} from './env.validation';

const GATEWAY_CONFIG_NAMESPACE = 'gateway';

export interface CommerceConfig {
  readonly baseUrl: string;
  readonly appId: string;
  readonly appSecret: string;
  readonly tenant: string;
  readonly timeoutMs: number;
  readonly orderShape: CommerceOrderShape;
}

export interface TrackingConfig {
  readonly enabled: boolean;
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly userKey?: string;
  readonly password?: string;
  readonly customerNo?: string;
  readonly timeoutMs: number;
}

export interface IpAllowlistConfig {
  readonly enforced: boolean;
  readonly allowedIps: readonly string[];
}

/**
 * Immutable runtime configuration, built once at startup and handed to
 * every component through its constructor.
 */
export interface GatewayConfig {
  readonly apiKey: string;
  readonly orderIdPattern: RegExp;
  readonly supportContact: string;
  readonly mode: LookupMode;
  readonly ipAllowlist: IpAllowlistConfig;
  readonly commerce: CommerceConfig;
  readonly tracking: TrackingConfig;
}

export function buildGatewayConfig(env: AppEnv): GatewayConfig {
  return Object.freeze({
    apiKey: env.API_KEY,
    orderIdPattern: new RegExp(env.ORDER_ID_REGEX),
    supportContact: env.SUPPORT_CONTACT,
    mode: env.LOOKUP_MODE,
    ipAllowlist: Object.freeze({
      enforced: env.ENFORCE_IP_ALLOWLIST,
      allowedIps: Object.freeze([...env.ALLOWED_PROXY_IPS]),
    }),
    commerce: Object.freeze({
      baseUrl: stripTrailingSlash(env.COMMERCE_BASE_URL),
      appId: env.COMMERCE_APP_ID,
      appSecret: env.COMMERCE_APP_SECRET,
      tenant: env.COMMERCE_TENANT,
      timeoutMs: env.COMMERCE_TIMEOUT_MS,
      orderShape: env.COMMERCE_ORDER_SHAPE,
    }),
    tracking: Object.freeze({
      enabled: env.TRACKING_ENABLED,
      baseUrl: stripTrailingSlash(env.TRACKING_BASE_URL),
      apiKey: env.TRACKING_API_KEY,
      userKey: env.TRACKING_USER_KEY,
      password: env.TRACKING_PASSWORD,
      customerNo: env.TRACKING_CUSTOMER_NO,
      timeoutMs: env.TRACKING_TIMEOUT_MS,
    }),
  });
}

/**
 * Injected with `@Inject(gatewayConfig.KEY)`; tests override that token with
 * a config built from `buildGatewayConfig`.
 */
export const gatewayConfig = registerAs(GATEWAY_CONFIG_NAMESPACE, (): GatewayConfig =>
  buildGatewayConfig(validateEnv(process.env)),
);

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}
