import { publishDiscovery } from './discovery.js';
import { PollingEngine } from './engine.js';
import type { CadenceOptions } from './engine.js';
import { log } from './log.js';
import type { ChangePublisher } from './publisher.js';
import type { CommandQueue } from './queue.js';
import type { GeoPoint, MessageSink, Vehicle, VehicleApi, VehicleSession } from './types.js';

export type SessionResult = { ok: true } | { ok: false; error: unknown };

export interface BackoffOptions {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 15_000,
  factor: 1.5,
  maxDelayMs: 3_600_000,
};

export interface SupervisorOptions {
  api: VehicleApi;
  queue: CommandQueue;
  publisher: ChangePublisher;
  sink: MessageSink;
  basetopic: string;
  discoveryPrefix: string;
  vin?: string;
  home?: GeoPoint | null;
  backoff?: Partial<BackoffOptions>;
  cadence?: Partial<CadenceOptions>;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function selectVehicle(vehicles: Vehicle[], vin?: string): Vehicle {
  if (vehicles.length === 0) throw new Error('no vehicles on this account');
  if (!vin) return vehicles[0];
  const match = vehicles.find((v) => v.vin.toUpperCase() === vin.toUpperCase());
  if (!match) throw new Error(`vehicle ${vin} not found on this account`);
  return match;
}

/**
 * Keeps the bridge running across vehicle session failures: each failure drains
 * stale commands, waits out the current backoff, then opens a fresh session.
 * There is no retry limit; only the abort signal ends the loop.
 */
export class Supervisor {
  private readonly backoff: BackoffOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private delay: number;

  constructor(private readonly opts: SupervisorOptions) {
    this.backoff = { ...DEFAULT_BACKOFF, ...opts.backoff };
    this.sleep = opts.sleep ?? defaultSleep;
    this.delay = this.backoff.baseDelayMs;
  }

  get backoffMs(): number {
    return this.delay;
  }

  resetBackoff(): void {
    this.delay = this.backoff.baseDelayMs;
  }

  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      const result = await this.runSession(signal);
      if (result.ok) continue;

      const dropped = this.opts.queue.drain();
      if (dropped > 0) log.warn(`discarded ${dropped} queued command(s) after session failure`);
      log.error('error in vehicle session:', result.error);
      if (signal?.aborted) break;

      log.info(`sleeping ${(this.delay / 1000).toFixed(1)}s from error`);
      await this.sleep(this.delay);
      this.delay = Math.min(this.delay * this.backoff.factor, this.backoff.maxDelayMs);
    }
  }

  /** One vehicle session, from login to the first unrecovered error. Never throws. */
  async runSession(signal?: AbortSignal): Promise<SessionResult> {
    let session: VehicleSession | null = null;
    try {
      session = await this.opts.api.open();
      const vehicle = selectVehicle(await session.vehicleList(), this.opts.vin);
      const snapshot = await vehicle.getSnapshot();
      log.info(`session established for ${snapshot.vehicleName} (${vehicle.vin})`);
      publishDiscovery(this.opts.sink, snapshot, {
        basetopic: this.opts.basetopic,
        discoveryPrefix: this.opts.discoveryPrefix,
      });

      const engine = new PollingEngine(vehicle, this.opts.queue, this.opts.publisher, {
        ...this.opts.cadence,
        home: this.opts.home ?? null,
        onCycleSuccess: () => this.resetBackoff(),
      });
      await engine.run(signal);
      return { ok: true };
    } catch (error) {
      return { ok: false, error };
    } finally {
      session?.close();
    }
  }
}
