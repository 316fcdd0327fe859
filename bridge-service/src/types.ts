// Shared types for the bridge

export interface GeoPoint {
  lat: number;
  lng: number;
}

export type HomeState = 'home' | 'not_home';

/** Commands accepted on `{basetopic}/+/set`. `null` on the queue is a bare wake-up. */
export type Command =
  | { kind: 'set_charge_limit'; percent: number }
  | { kind: 'start_charge' }
  | { kind: 'stop_charge' };

export type QueueItem = Command | null;

export type PublishedValue = string | number | null;

export interface VehicleSummary {
  state: string; // 'online' | 'asleep' | 'offline' | ...
}

export interface ChargeState {
  chargingState: string | null;
  timeToFullCharge: number | null;
  batteryLevel: number | null;
  chargeLimitSoc: number | null;
}

export interface DriveState {
  latitude: number | null;
  longitude: number | null;
  heading: number | null;
  speed: number | null;
  shiftState: string | null;
}

export interface VehicleSnapshot {
  vin: string;
  vehicleName: string;
  carType: string;
  trimBadging: string;
  charge: ChargeState;
  drive: DriveState;
}

/** One vehicle on the account, bound to an open session. */
export interface Vehicle {
  readonly vin: string;
  getSummary(): Promise<VehicleSummary>;
  getSnapshot(): Promise<VehicleSnapshot>;
  setChargeLimit(percent: number): Promise<void>;
  startCharge(): Promise<void>;
  stopCharge(): Promise<void>;
}

export interface VehicleSession {
  vehicleList(): Promise<Vehicle[]>;
  close(): void;
}

export interface VehicleApi {
  open(): Promise<VehicleSession>;
}

export interface PublishOptions {
  qos?: 0 | 1 | 2;
  retain?: boolean;
}

/** Outbound side of the MQTT connection. */
export interface MessageSink {
  publish(topic: string, message: string, options?: PublishOptions): void;
}
