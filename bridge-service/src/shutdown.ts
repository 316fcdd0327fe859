import type { MqttClient } from 'mqtt';
import { log } from './log.js';

export function registerShutdown(client: MqttClient, controller: AbortController): void {
  const shutdown = (signal: string) => {
    log.info(`received ${signal}, shutting down...`);
    controller.abort();
    try {
      client.end(true);
    } catch (error) {
      log.warn('error closing MQTT client:', error);
    }
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
