import { VehicleError } from './errors.js';
import { log } from './log.js';
import type { Command, Vehicle } from './types.js';

export const ALREADY_SET = 'already_set';

/**
 * Map an inbound `{basetopic}/{setting}/set` message to a command.
 * Returns null (after logging) for unknown settings and unusable payloads.
 */
export function parseCommand(topic: string, payload: string): Command | null {
  const parts = topic.split('/');
  const setting = parts.length >= 2 ? parts[parts.length - 2] : '';
  log.debug(`incoming MQTT message: ${setting} : ${payload}`);

  switch (setting) {
    case 'charge_limit': {
      const value = Number(payload.trim());
      if (payload.trim() === '' || !Number.isFinite(value)) {
        log.error(`invalid charge_limit payload: "${payload}"`);
        return null;
      }
      return { kind: 'set_charge_limit', percent: Math.trunc(value) };
    }
    case 'charging':
      if (payload === 'true') return { kind: 'start_charge' };
      if (payload === 'false') return { kind: 'stop_charge' };
      log.warn(`invalid charging payload: "${payload}"`);
      return null;
    default:
      log.error(`Unknown MQTT setting: ${setting}`);
      return null;
  }
}

export function describeCommand(command: Command): string {
  return command.kind === 'set_charge_limit' ? `${command.kind}(${command.percent})` : command.kind;
}

export async function applyCommand(vehicle: Vehicle, command: Command): Promise<void> {
  switch (command.kind) {
    case 'set_charge_limit':
      return vehicle.setChargeLimit(command.percent);
    case 'start_charge':
      return vehicle.startCharge();
    case 'stop_charge':
      return vehicle.stopCharge();
  }
}

export function isAlreadySet(err: unknown): boolean {
  return err instanceof VehicleError && err.reason === ALREADY_SET;
}
