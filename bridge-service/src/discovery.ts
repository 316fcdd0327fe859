import { log } from './log.js';
import type { MessageSink, VehicleSnapshot } from './types.js';

export interface DiscoveryOptions {
  basetopic: string;
  discoveryPrefix: string;
}

export interface DiscoveryMessage {
  topic: string;
  config: Record<string, unknown>;
}

// "model3" + "74d" -> "Model 3 74D"
export function modelName(carType: string, trimBadging: string): string {
  const spaced = carType.length > 1 ? `${carType.slice(0, -1)} ${carType.slice(-1)}` : carType;
  const titled = spaced.replace(/[A-Za-z]+/g, (w) => w[0].toUpperCase() + w.slice(1).toLowerCase());
  return trimBadging ? `${titled} ${trimBadging.toUpperCase()}` : titled;
}

/**
 * Home Assistant MQTT discovery descriptors for one vehicle: the sensors, the charge
 * limit number, the charger switch and the location tracker, all grouped under one device.
 */
export function buildDiscovery(snapshot: VehicleSnapshot, opts: DiscoveryOptions): DiscoveryMessage[] {
  const { vin, vehicleName: name } = snapshot;
  const base = opts.basetopic;
  const topic = (component: string, object: string) => `${opts.discoveryPrefix}/${component}/${vin}/${object}/config`;
  const device = { identifiers: [`${vin}_device`] };

  return [
    {
      topic: topic('sensor', 'charging'),
      config: {
        name: `${name} Charging State`,
        state_topic: `${base}/charging`,
        unique_id: `${vin}_charging`,
        device,
        icon: 'mdi:ev-station',
      },
    },
    {
      topic: topic('sensor', 'battery'),
      config: {
        name: `${name} Battery Level`,
        state_topic: `${base}/battery_level`,
        unique_id: `${vin}_battery_level`,
        unit_of_measurement: '%',
        device_class: 'battery',
        device: {
          ...device,
          name: `${name} Vehicle`,
          manufacturer: 'Tesla',
          model: modelName(snapshot.carType, snapshot.trimBadging),
        },
      },
    },
    {
      topic: topic('sensor', 'timetofull'),
      config: {
        name: `${name} Time to Full`,
        state_topic: `${base}/time_to_full`,
        unique_id: `${vin}_time_to_full`,
        unit_of_measurement: 'h',
        device,
        icon: 'hass:clock-fast',
      },
    },
    {
      topic: topic('number', 'chargelimit'),
      config: {
        name: `${name} Charge Limit`,
        state_topic: `${base}/charge_limit`,
        command_topic: `${base}/charge_limit/set`,
        unique_id: `${vin}_charge_limit`,
        min: 50,
        max: 100,
        device,
        icon: 'hass:battery-alert',
      },
    },
    {
      topic: topic('switch', 'chargeswitch'),
      config: {
        name: `${name} Charger`,
        state_topic: `${base}/charging`,
        command_topic: `${base}/charging/set`,
        value_template: "{{ 'ON' if value == 'Charging' else 'OFF' }}",
        state_on: 'ON',
        state_off: 'OFF',
        payload_on: 'true',
        payload_off: 'false',
        unique_id: `${vin}_charge_switch`,
        device,
        icon: 'mdi:power-plug',
      },
    },
    {
      topic: topic('sensor', 'shiftstate'),
      config: {
        name: `${name} Shift State`,
        state_topic: `${base}/shift_state`,
        unique_id: `${vin}_shift_state`,
        device,
        icon: 'mdi:car-shift-pattern',
      },
    },
    {
      topic: topic('device_tracker', 'gps'),
      config: {
        name: `${name} Location`,
        json_attributes_topic: `${base}/gps`,
        state_topic: `${base}/gps`,
        value_template: '{{value_json.state}}',
        unique_id: `${vin}_gps`,
        device,
        source_type: 'gps',
        icon: 'mdi:crosshairs-gps',
      },
    },
  ];
}

export function publishDiscovery(sink: MessageSink, snapshot: VehicleSnapshot, opts: DiscoveryOptions): number {
  const messages = buildDiscovery(snapshot, opts);
  for (const m of messages) {
    sink.publish(m.topic, JSON.stringify(m.config), { qos: 1, retain: true });
  }
  log.info(`announced ${messages.length} discovery entities for ${snapshot.vin} under ${opts.discoveryPrefix}/`);
  return messages.length;
}
