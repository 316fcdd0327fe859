import { describe, it, expect, vi, afterEach } from 'vitest';
import { PollingEngine, gpsPayload, nextCadence, DEFAULT_CADENCE } from '../src/engine.js';
import { VehicleError } from '../src/errors.js';
import { handleInbound } from '../src/mqtt.js';
import { ChangePublisher } from '../src/publisher.js';
import { CommandQueue } from '../src/queue.js';
import { FakeVehicle, RecordingSink, makeSnapshot } from './fakes.js';

function setup(vehicle = new FakeVehicle(), onCycleSuccess = () => {}) {
  const sink = new RecordingSink();
  const queue = new CommandQueue();
  const publisher = new ChangePublisher(sink, 'tesla/car');
  const engine = new PollingEngine(vehicle, queue, publisher, { onCycleSuccess });
  return { sink, queue, publisher, engine, vehicle };
}

/** Run one cycle that has to wait out the full cadence. */
async function idleCycle(engine: PollingEngine) {
  const pending = engine.cycle();
  await vi.advanceTimersByTimeAsync(engine.cadenceMs);
  return pending;
}

afterEach(() => {
  vi.useRealTimers();
});

describe('nextCadence', () => {
  it('resets to the active interval while driving', () => {
    expect(nextCadence(600_000, true, false)).toBe(15_000);
  });

  it('uses four times the active interval while active but parked', () => {
    expect(nextCadence(600_000, true, true)).toBe(60_000);
  });

  it('grows by 1.2 while idle', () => {
    expect(nextCadence(60_000, false, true)).toBe(72_000);
  });

  it('never exceeds the maximum', () => {
    expect(nextCadence(600_000, false, true)).toBe(DEFAULT_CADENCE.maxIntervalMs);
    expect(nextCadence(100, true, true, { ...DEFAULT_CADENCE, activeIntervalMs: 50, maxIntervalMs: 120 })).toBe(120);
  });
});

describe('gpsPayload', () => {
  it('builds the location record with the home state', () => {
    const snap = makeSnapshot({ latitude: 10, longitude: 20 });
    expect(JSON.parse(gpsPayload(snap, { lat: 10, lng: 20 }))).toEqual({
      latitude: 10,
      longitude: 20,
      heading: 180,
      speed: 0,
      state: 'home',
      gps_accuracy: 1,
    });
    expect(JSON.parse(gpsPayload(snap, { lat: 10.01, lng: 20 })).state).toBe('not_home');
  });

  it('reads missing coordinates as 0', () => {
    const snap = makeSnapshot({ latitude: null, longitude: null });
    expect(JSON.parse(gpsPayload(snap, null))).toMatchObject({ latitude: 0, longitude: 0, state: 'home' });
  });
});

describe('PollingEngine', () => {
  it('starts with the long idle cadence', () => {
    const { engine } = setup();
    expect(engine.cadenceMs).toBe(660_000);
  });

  it('polls immediately on start and publishes every telemetry key', async () => {
    const { engine, sink } = setup();
    const report = await engine.cycle();

    expect(report).toEqual({ command: null, online: true, active: true, parked: true, cadenceMs: 60_000 });
    expect(sink.messages.map((m) => [m.topic, m.message])).toEqual([
      ['tesla/car/charging', 'Disconnected'],
      ['tesla/car/time_to_full', '0'],
      ['tesla/car/battery_level', '64'],
      ['tesla/car/charge_limit', '90'],
      ['tesla/car/gps', '{"latitude":10,"longitude":20,"heading":180,"speed":0,"state":"home","gps_accuracy":1}'],
      ['tesla/car/shift_state', 'P'],
    ]);
  });

  it('does not republish unchanged values on later cycles', async () => {
    vi.useFakeTimers();
    const { engine, sink } = setup();
    await engine.cycle();
    await idleCycle(engine);
    await idleCycle(engine);
    expect(sink.messages).toHaveLength(6);
  });

  it('grows the cadence by 1.2 on idle cycles', async () => {
    vi.useFakeTimers();
    const { engine } = setup();
    await engine.cycle();
    expect(engine.cadenceMs).toBe(60_000);

    const report = await idleCycle(engine);
    expect(report.active).toBe(false);
    expect(engine.cadenceMs).toBe(72_000);

    await idleCycle(engine);
    expect(engine.cadenceMs).toBe(86_400);
  });

  it('resets to the base interval while driving', async () => {
    vi.useFakeTimers();
    const vehicle = new FakeVehicle();
    vehicle.snapshots = [makeSnapshot(), makeSnapshot({ shiftState: 'D' })];
    const { engine, sink } = setup(vehicle);
    await engine.cycle();

    const report = await idleCycle(engine);
    expect(report).toMatchObject({ active: true, parked: false, cadenceMs: 15_000 });
    expect(sink.messages.at(-1)).toMatchObject({ topic: 'tesla/car/shift_state', message: 'D' });
  });

  it('uses four times the base interval while charging in park', async () => {
    vi.useFakeTimers();
    const vehicle = new FakeVehicle();
    vehicle.snapshots = [makeSnapshot(), makeSnapshot({ chargingState: 'Charging', shiftState: 'P' })];
    const { engine } = setup(vehicle);
    await engine.cycle();
    await idleCycle(engine);
    await idleCycle(engine);
    expect(engine.cadenceMs).toBe(60_000);
  });

  it('publishes nothing while the vehicle is offline and treats the cycle as idle', async () => {
    vi.useFakeTimers();
    const vehicle = new FakeVehicle();
    vehicle.summaries = [{ state: 'asleep' }];
    const { engine, sink } = setup(vehicle);

    const first = await engine.cycle();
    expect(first).toEqual({ command: null, online: false, active: false, parked: true, cadenceMs: 660_000 });

    const second = await idleCycle(engine);
    expect(second).toMatchObject({ online: false, active: false, cadenceMs: 660_000 });
    expect(sink.messages).toHaveLength(0);
  });

  it('counts a command sent to an offline vehicle as activity', async () => {
    const vehicle = new FakeVehicle();
    vehicle.summaries = [{ state: 'asleep' }];
    const { engine, queue } = setup(vehicle);
    await engine.cycle();
    queue.enqueue({ kind: 'stop_charge' });

    const report = await engine.cycle();
    expect(report).toEqual({
      command: { kind: 'stop_charge' },
      online: false,
      active: true,
      parked: true,
      cadenceMs: 60_000,
    });
    expect(vehicle.calls).toEqual(['charge_stop']);
  });

  it('sends a queued command before polling', async () => {
    const { engine, queue, vehicle } = setup();
    await engine.cycle();
    queue.enqueue({ kind: 'start_charge' });

    const report = await engine.cycle();
    expect(report.command).toEqual({ kind: 'start_charge' });
    expect(report.active).toBe(true);
    expect(vehicle.calls).toEqual(['charge_start']);
  });

  it('ignores an already_set rejection', async () => {
    const { engine, queue, vehicle } = setup();
    vehicle.commandError = new VehicleError('already_set');
    queue.enqueue({ kind: 'set_charge_limit', percent: 90 });
    await engine.cycle();

    await expect(engine.cycle()).resolves.toMatchObject({ command: { kind: 'set_charge_limit', percent: 90 } });
    expect(vehicle.calls).toEqual(['set_charge_limit:90']);
  });

  it('lets any other command failure escape', async () => {
    const onCycleSuccess = vi.fn();
    const { engine, queue, vehicle } = setup(new FakeVehicle(), onCycleSuccess);
    vehicle.commandError = new VehicleError('could_not_wake_buses');
    queue.enqueue({ kind: 'stop_charge' });
    await engine.cycle();
    expect(onCycleSuccess).toHaveBeenCalledTimes(1);

    await expect(engine.cycle()).rejects.toThrow('vehicle rejected command: could_not_wake_buses');
    expect(onCycleSuccess).toHaveBeenCalledTimes(1);
  });

  it('lets fetch failures escape', async () => {
    const vehicle = new FakeVehicle();
    vehicle.summaries = [new Error('token expired')];
    const { engine } = setup(vehicle);
    await expect(engine.cycle()).rejects.toThrow('token expired');
  });

  it('applies an inbound charge limit and publishes the new limit once', async () => {
    vi.useFakeTimers();
    const vehicle = new FakeVehicle();
    const { engine, queue, sink } = setup(vehicle);
    handleInbound(queue, 'tesla/car/charge_limit/set', Buffer.from('80'));

    await engine.cycle(); // start-up wake
    vehicle.snapshots = [makeSnapshot({ chargeLimitSoc: 80 })];
    await engine.cycle(); // the command
    await idleCycle(engine);
    await idleCycle(engine);

    expect(vehicle.calls).toEqual(['set_charge_limit:80']);
    const limits = sink.messages.filter((m) => m.topic === 'tesla/car/charge_limit').map((m) => m.message);
    expect(limits).toEqual(['90', '80']);
  });

  it('stops looping once the signal is aborted', async () => {
    const { engine } = setup();
    const controller = new AbortController();
    controller.abort();
    await expect(engine.run(controller.signal)).resolves.toBeUndefined();
  });
});
