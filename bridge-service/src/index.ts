#!/usr/bin/env node
/**
 * Vehicle Bridge
 * ---------------------------------------------
 * Purpose
 * - Mirror a vehicle's charge and drive state onto MQTT and forward MQTT commands
 *   back to the vehicle.
 *
 * Responsibilities
 * - Subscribe to `{basetopic}/+/set` and queue the resulting commands
 * - Poll the vehicle cloud API on an adaptive cadence and publish changed values
 *   under `{basetopic}/<key>`
 * - Announce Home Assistant discovery entities once per vehicle session
 * - Restart the vehicle session with exponential backoff after any failure
 *
 * Environment & Dependencies
 * - TESLA_CLIENT_ID, TESLA_REFRESH_TOKEN: vehicle API credentials
 * - TESLA_MQTTHOST (+ TESLA_MQTT_USERNAME/PASSWORD/TLS_*): broker connection
 * - TESLA_API_BASE, TESLA_AUTH_BASE, TESLA_API_TIMEOUT_MS: vehicle cloud endpoints and request timeout
 * - TESLA_BASETOPIC, TESLA_VIN, TESLA_GPSHOME, TESLA_DEBUG: see config.ts
 *
 * Operational Notes
 * - Commands received while a session is down are discarded, not replayed
 * - Last published values survive session restarts, so unchanged values are not re-sent
 */
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { FleetApi } from './fleet.js';
import { log, setDebug } from './log.js';
import { mqttSink, startMqtt } from './mqtt.js';
import { ChangePublisher } from './publisher.js';
import { CommandQueue } from './queue.js';
import { registerShutdown } from './shutdown.js';
import { Supervisor } from './supervisor.js';

dotenv.config();

async function main() {
  const config = loadConfig();
  setDebug(config.debug);
  log.info('starting...');

  const queue = new CommandQueue();
  const client = startMqtt(config, queue);
  const sink = mqttSink(client);
  const controller = new AbortController();
  registerShutdown(client, controller);

  const supervisor = new Supervisor({
    api: new FleetApi(config),
    queue,
    publisher: new ChangePublisher(sink, config.basetopic),
    sink,
    basetopic: config.basetopic,
    discoveryPrefix: config.discoveryPrefix,
    vin: config.vin,
    home: config.home,
  });
  await supervisor.run(controller.signal);
}

main().catch((e) => {
  log.error('startup failed:', e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
