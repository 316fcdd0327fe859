import { applyCommand, describeCommand, isAlreadySet } from './commands.js';
import { classify } from './geo.js';
import { log } from './log.js';
import type { ChangePublisher } from './publisher.js';
import type { CommandQueue } from './queue.js';
import type { Command, GeoPoint, Vehicle, VehicleSnapshot } from './types.js';

export const PARKED = 'P';
export const CHARGING = 'Charging';

export interface CadenceOptions {
  activeIntervalMs: number;
  maxIntervalMs: number;
  idleGrowth: number;
  parkedActiveFactor: number;
}

export const DEFAULT_CADENCE: CadenceOptions = {
  activeIntervalMs: 15_000,
  maxIntervalMs: 11 * 60_000,
  idleGrowth: 1.2,
  parkedActiveFactor: 4,
};

export interface EngineOptions extends Partial<CadenceOptions> {
  home?: GeoPoint | null;
  /** Called after every cycle that completed without error. */
  onCycleSuccess?: () => void;
}

export interface CycleReport {
  command: Command | null;
  online: boolean;
  active: boolean;
  parked: boolean;
  cadenceMs: number;
}

/** Sleep before the next cycle: short while something is happening, slowly longer while idle. */
export function nextCadence(currentMs: number, active: boolean, parked: boolean, o: CadenceOptions = DEFAULT_CADENCE): number {
  const next = active
    ? o.activeIntervalMs * (parked ? o.parkedActiveFactor : 1)
    : currentMs * o.idleGrowth;
  return Math.min(next, o.maxIntervalMs);
}

// Anything that is not a finite number reads as 0.
function toNumber(value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function gpsPayload(snapshot: VehicleSnapshot, home: GeoPoint | null): string {
  const latitude = toNumber(snapshot.drive.latitude);
  const longitude = toNumber(snapshot.drive.longitude);
  return JSON.stringify({
    latitude,
    longitude,
    heading: toNumber(snapshot.drive.heading),
    speed: toNumber(snapshot.drive.speed),
    state: classify(home, { lat: latitude, lng: longitude }),
    gps_accuracy: 1,
  });
}

/**
 * One vehicle session's poll loop: wait on the command queue for up to the current
 * cadence, send the command if one arrived, then fetch state and publish what changed.
 * Any error other than an `already_set` rejection escapes to the caller.
 */
export class PollingEngine {
  private readonly cadence: CadenceOptions;
  private readonly home: GeoPoint | null;
  private readonly onCycleSuccess: () => void;
  private current: number;

  constructor(
    private readonly vehicle: Vehicle,
    private readonly queue: CommandQueue,
    private readonly publisher: ChangePublisher,
    options: EngineOptions = {},
  ) {
    this.cadence = {
      activeIntervalMs: options.activeIntervalMs ?? DEFAULT_CADENCE.activeIntervalMs,
      maxIntervalMs: options.maxIntervalMs ?? DEFAULT_CADENCE.maxIntervalMs,
      idleGrowth: options.idleGrowth ?? DEFAULT_CADENCE.idleGrowth,
      parkedActiveFactor: options.parkedActiveFactor ?? DEFAULT_CADENCE.parkedActiveFactor,
    };
    this.home = options.home ?? null;
    this.onCycleSuccess = options.onCycleSuccess ?? (() => {});
    this.current = this.cadence.maxIntervalMs;
  }

  get cadenceMs(): number {
    return this.current;
  }

  async cycle(): Promise<CycleReport> {
    log.debug(`sleeping ${(this.current / 1000).toFixed(1)}s`);
    const next = await this.queue.waitNext(this.current);
    const command = next.timedOut ? null : next.item;
    let active = !next.timedOut;

    if (command) await this.send(command);

    const summary = await this.vehicle.getSummary();
    log.debug(`vehicle state: ${summary.state}`);
    const online = summary.state === 'online';
    let parked = true;

    if (online) {
      const snapshot = await this.vehicle.getSnapshot();
      const shiftState = this.publishTelemetry(snapshot);
      parked = shiftState === PARKED;
      if (!parked || snapshot.charge.chargingState === CHARGING) active = true;
    } else {
      // the start-up wake item does not count while the vehicle sleeps
      active = command !== null;
    }

    this.current = nextCadence(this.current, active, parked, this.cadence);
    this.onCycleSuccess();
    return { command, online, active, parked, cadenceMs: this.current };
  }

  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      await this.cycle();
    }
  }

  private async send(command: Command): Promise<void> {
    log.debug(`sending vehicle command: ${describeCommand(command)}`);
    try {
      await applyCommand(this.vehicle, command);
    } catch (err) {
      if (!isAlreadySet(err)) throw err;
      log.debug('command already set, ignored');
    }
  }

  /** Publishes every telemetry key and returns the effective shift state. */
  private publishTelemetry(snapshot: VehicleSnapshot): string {
    const { charge, drive } = snapshot;
    this.publisher.publishIfChanged('charging', charge.chargingState);
    this.publisher.publishIfChanged('time_to_full', charge.timeToFullCharge);
    this.publisher.publishIfChanged('battery_level', charge.batteryLevel);
    this.publisher.publishIfChanged('charge_limit', charge.chargeLimitSoc);
    this.publisher.publishIfChanged('gps', gpsPayload(snapshot, this.home));
    const shiftState = drive.shiftState || PARKED;
    this.publisher.publishIfChanged('shift_state', shiftState);
    return shiftState;
  }
}
