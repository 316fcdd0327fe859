import { z } from 'zod';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './config.js';
import { FleetApiError, VehicleError } from './errors.js';
import { log } from './log.js';
import type { Vehicle, VehicleApi, VehicleSession, VehicleSnapshot, VehicleSummary } from './types.js';

export interface FleetApiOptions {
  clientId: string;
  refreshToken: string;
  apiBase: string;
  authBase: string;
  /** Per-request limit; a request still pending after this fails the session. */
  requestTimeoutMs?: number;
}

const tokenSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
});

const vehicleListSchema = z.object({
  response: z.array(z.object({ vin: z.string(), display_name: z.string().nullish(), state: z.string().nullish() })),
});

const summarySchema = z.object({
  response: z.object({ state: z.string() }),
});

const num = z.number().nullish();
const str = z.string().nullish();

const vehicleDataSchema = z.object({
  response: z.object({
    vin: z.string(),
    display_name: str,
    charge_state: z
      .object({ charging_state: str, time_to_full_charge: num, battery_level: num, charge_limit_soc: num })
      .nullish(),
    drive_state: z
      .object({ latitude: num, longitude: num, heading: num, speed: num, shift_state: str })
      .nullish(),
    vehicle_state: z.object({ vehicle_name: str }).nullish(),
    vehicle_config: z.object({ car_type: str, trim_badging: str }).nullish(),
  }),
});

const commandSchema = z.object({
  response: z.object({ result: z.boolean(), reason: z.string().nullish() }),
});

const DATA_ENDPOINTS = ['charge_state', 'drive_state', 'location_data', 'vehicle_state', 'vehicle_config'].join(';');

async function readJson<S extends z.ZodTypeAny>(res: Response, schema: S, what: string): Promise<z.infer<S>> {
  if (!res.ok) {
    const body = await res.text().catch(() => '');
    throw new FleetApiError(res.status, `${what} failed (${res.status}): ${body}`);
  }
  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) {
    throw new FleetApiError(res.status, `${what}: unexpected response shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** `fetch` plus `readJson`, failing with a `FleetApiError` once `timeoutMs` has passed. */
async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  init: RequestInit,
  schema: S,
  what: string,
  timeoutMs: number,
): Promise<z.infer<S>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new FleetApiError(0, `${what} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  const request = fetch(url, { ...init, signal: controller.signal }).then((res) => readJson(res, schema, what));
  try {
    return await Promise.race([request, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** Vehicle bound to a session's access token. */
export class FleetVehicle implements Vehicle {
  constructor(readonly vin: string, private readonly session: FleetSession) {}

  async getSummary(): Promise<VehicleSummary> {
    const data = await this.session.get(`/api/1/vehicles/${this.vin}`, summarySchema, 'vehicle summary');
    return { state: data.response.state };
  }

  async getSnapshot(): Promise<VehicleSnapshot> {
    const path = `/api/1/vehicles/${this.vin}/vehicle_data?endpoints=${encodeURIComponent(DATA_ENDPOINTS)}`;
    const { response: r } = await this.session.get(path, vehicleDataSchema, 'vehicle data');
    return {
      vin: r.vin,
      vehicleName: r.vehicle_state?.vehicle_name ?? r.display_name ?? r.vin,
      carType: r.vehicle_config?.car_type ?? '',
      trimBadging: r.vehicle_config?.trim_badging ?? '',
      charge: {
        chargingState: r.charge_state?.charging_state ?? null,
        timeToFullCharge: r.charge_state?.time_to_full_charge ?? null,
        batteryLevel: r.charge_state?.battery_level ?? null,
        chargeLimitSoc: r.charge_state?.charge_limit_soc ?? null,
      },
      drive: {
        latitude: r.drive_state?.latitude ?? null,
        longitude: r.drive_state?.longitude ?? null,
        heading: r.drive_state?.heading ?? null,
        speed: r.drive_state?.speed ?? null,
        shiftState: r.drive_state?.shift_state ?? null,
      },
    };
  }

  setChargeLimit(percent: number): Promise<void> {
    return this.command('set_charge_limit', { percent });
  }

  startCharge(): Promise<void> {
    return this.command('charge_start');
  }

  stopCharge(): Promise<void> {
    return this.command('charge_stop');
  }

  private async command(name: string, body: Record<string, unknown> = {}): Promise<void> {
    const data = await this.session.post(`/api/1/vehicles/${this.vin}/command/${name}`, body, commandSchema, name);
    if (!data.response.result) throw new VehicleError(data.response.reason || 'unknown');
  }
}

export class FleetSession implements VehicleSession {
  private closed = false;

  constructor(
    private readonly apiBase: string,
    private accessToken: string,
    private readonly timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {}

  async vehicleList(): Promise<Vehicle[]> {
    const data = await this.get('/api/1/vehicles', vehicleListSchema, 'vehicle list');
    return data.response.map((v) => new FleetVehicle(v.vin, this));
  }

  async get<S extends z.ZodTypeAny>(path: string, schema: S, what: string): Promise<z.infer<S>> {
    return requestJson(`${this.apiBase}${path}`, { headers: this.headers() }, schema, what, this.timeoutMs);
  }

  async post<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S, what: string): Promise<z.infer<S>> {
    return requestJson(
      `${this.apiBase}${path}`,
      {
        method: 'POST',
        headers: { ...this.headers(), 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      schema,
      what,
      this.timeoutMs,
    );
  }

  close(): void {
    this.closed = true;
    this.accessToken = '';
  }

  private headers(): Record<string, string> {
    if (this.closed) throw new Error('vehicle session is closed');
    return { Authorization: `Bearer ${this.accessToken}` };
  }
}

/**
 * Vehicle cloud client. Each `open()` trades the current refresh token for a fresh
 * access token; the rotated refresh token replaces the old one in memory.
 */
export class FleetApi implements VehicleApi {
  private refreshToken: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: FleetApiOptions) {
    this.refreshToken = options.refreshToken;
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async open(): Promise<VehicleSession> {
    const tokens = await requestJson(
      `${this.options.authBase}/oauth2/v3/token`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          client_id: this.options.clientId,
          refresh_token: this.refreshToken,
        }),
      },
      tokenSchema,
      'token refresh',
      this.timeoutMs,
    );
    if (tokens.refresh_token) this.refreshToken = tokens.refresh_token;
    log.debug(`access token refreshed, expires in ${tokens.expires_in ?? '?'}s`);
    return new FleetSession(this.options.apiBase, tokens.access_token, this.timeoutMs);
  }
}
