import { ConfigError } from './errors.js';
import type { GeoPoint } from './types.js';

export const SERVICE = 'vehicle-bridge';

// Every setting is read from a TESLA_* environment variable; `--key=value` on the
// command line maps onto the same name and wins over the environment.
export const ENV_PREFIX = 'TESLA_';

export const DEFAULT_BASETOPIC = 'tesla/car';
export const DEFAULT_DISCOVERY_PREFIX = 'homeassistant';
export const DEFAULT_API_BASE = 'https://fleet-api.prd.na.vn.cloud.tesla.com';
export const DEFAULT_AUTH_BASE = 'https://auth.tesla.com';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface BridgeConfig {
  clientId: string;
  refreshToken: string;
  vin: string | undefined;
  mqttUrl: string;
  mqttUsername: string | undefined;
  mqttPassword: string | undefined;
  mqttTlsCa: string | undefined;
  mqttTlsCert: string | undefined;
  mqttTlsKey: string | undefined;
  mqttTlsRejectUnauthorized: boolean;
  basetopic: string;
  discoveryPrefix: string;
  home: GeoPoint | null;
  apiBase: string;
  authBase: string;
  requestTimeoutMs: number;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Fold `--some-key=value` / `--flag` arguments into TESLA_SOME_KEY entries.
 * Anything that does not start with `--` is ignored.
 */
export function argvToEnv(argv: readonly string[]): Env {
  const out: Env = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const value = eq === -1 ? 'true' : arg.slice(eq + 1);
    if (!name) continue;
    out[ENV_PREFIX + name.replace(/-/g, '_').toUpperCase()] = value;
  }
  return out;
}

/** Parse a "lat,lng" pair in decimal degrees. Empty input means no geofence. */
export function parseHome(text: string | undefined): GeoPoint | null {
  if (!text || !text.trim()) return null;
  const parts = text.split(',').map((p) => p.trim());
  if (parts.length !== 2) throw new ConfigError(`GPSHOME must be "lat,lng", got "${text}"`);
  const [lat, lng] = parts.map(Number);
  if (!Number.isFinite(lat) || !Number.isFinite(lng) || parts.some((p) => p === '')) {
    throw new ConfigError(`GPSHOME must be "lat,lng", got "${text}"`);
  }
  return { lat, lng };
}

function positiveMs(text: string | undefined, fallback: number, key: string): number {
  if (text === undefined) return fallback;
  const ms = Number(text);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new ConfigError(`${ENV_PREFIX}${key} must be a positive number of milliseconds, got "${text}"`);
  }
  return ms;
}

function mqttUrlFromHost(host: string): string {
  return host.includes('://') ? host : `mqtt://${host}:1883`;
}

function required(env: Env, key: string): string {
  const value = env[ENV_PREFIX + key];
  if (!value) throw new ConfigError(`missing required setting ${ENV_PREFIX}${key} (or --${key.toLowerCase()})`);
  return value;
}

function optional(env: Env, key: string): string | undefined {
  return env[ENV_PREFIX + key] || undefined;
}

export function loadConfig(env: Env = process.env, argv: readonly string[] = process.argv.slice(2)): BridgeConfig {
  const merged: Env = { ...env, ...argvToEnv(argv) };
  return {
    clientId: required(merged, 'CLIENT_ID'),
    refreshToken: required(merged, 'REFRESH_TOKEN'),
    vin: optional(merged, 'VIN'),
    mqttUrl: mqttUrlFromHost(required(merged, 'MQTTHOST')),
    mqttUsername: optional(merged, 'MQTT_USERNAME'),
    mqttPassword: optional(merged, 'MQTT_PASSWORD'),
    mqttTlsCa: optional(merged, 'MQTT_TLS_CA'),
    mqttTlsCert: optional(merged, 'MQTT_TLS_CERT'),
    mqttTlsKey: optional(merged, 'MQTT_TLS_KEY'),
    mqttTlsRejectUnauthorized: (merged[ENV_PREFIX + 'MQTT_TLS_REJECT_UNAUTHORIZED'] ?? 'true') !== 'false',
    basetopic: optional(merged, 'BASETOPIC') ?? DEFAULT_BASETOPIC,
    discoveryPrefix: optional(merged, 'DISCOVERY_PREFIX') ?? DEFAULT_DISCOVERY_PREFIX,
    home: parseHome(optional(merged, 'GPSHOME')),
    apiBase: (optional(merged, 'API_BASE') ?? DEFAULT_API_BASE).replace(/\/$/, ''),
    authBase: (optional(merged, 'AUTH_BASE') ?? DEFAULT_AUTH_BASE).replace(/\/$/, ''),
    requestTimeoutMs: positiveMs(optional(merged, 'API_TIMEOUT_MS'), DEFAULT_REQUEST_TIMEOUT_MS, 'API_TIMEOUT_MS'),
    debug: Boolean(optional(merged, 'DEBUG')),
  };
}
