/** The vehicle accepted the request but refused the command, e.g. `already_set`. */
export class VehicleError extends Error {
  readonly reason: string;
  constructor(reason: string, message?: string) {
    super(message ?? `vehicle rejected command: ${reason}`);
    this.reason = reason;
    this.name = 'VehicleError';
  }
}

/** Non-2xx answer (or an unreadable body) from the vehicle cloud API. */
export class FleetApiError extends Error {
  readonly status: number;
  constructor(status: number, message: string) {
    super(message);
    this.status = status;
    this.name = 'FleetApiError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
