import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import { existsSync, readFileSync } from 'fs';
import type { BridgeConfig } from './config.js';
import { parseCommand } from './commands.js';
import { log } from './log.js';
import type { CommandQueue } from './queue.js';
import type { MessageSink } from './types.js';

export function commandTopic(basetopic: string): string {
  return `${basetopic}/+/set`;
}

function readTlsFile(usingTls: boolean, label: string, path: string | undefined): Buffer | undefined {
  if (!usingTls || !path) return undefined;
  if (!existsSync(path)) {
    log.warn(`WARNING: ${label} path set but file not found: ${path}`);
    return undefined;
  }
  return readFileSync(path);
}

/** Turn inbound `{basetopic}/{setting}/set` messages into queued commands. */
export function handleInbound(queue: CommandQueue, topic: string, payload: Buffer | string): void {
  const command = parseCommand(topic, payload.toString());
  if (command) queue.enqueue(command);
}

export function mqttSink(client: MqttClient): MessageSink {
  return {
    publish(topic, message, options) {
      client.publish(topic, message, { qos: options?.qos ?? 0, retain: options?.retain ?? false }, (err) => {
        if (err) log.error(`publish error on ${topic}:`, err.message);
      });
    },
  };
}

export function startMqtt(config: BridgeConfig, queue: CommandQueue): MqttClient {
  const usingTls = config.mqttUrl.startsWith('mqtts://');
  const options: IClientOptions = {
    username: config.mqttUsername,
    password: config.mqttPassword,
    reconnectPeriod: 2000,
    ca: readTlsFile(usingTls, 'TESLA_MQTT_TLS_CA', config.mqttTlsCa),
    cert: readTlsFile(usingTls, 'TESLA_MQTT_TLS_CERT', config.mqttTlsCert),
    key: readTlsFile(usingTls, 'TESLA_MQTT_TLS_KEY', config.mqttTlsKey),
    rejectUnauthorized: config.mqttTlsRejectUnauthorized,
  };

  log.info(
    `MQTT config: url=${config.mqttUrl} ca=${config.mqttTlsCa || 'unset'} cert=${config.mqttTlsCert || 'unset'} key=${config.mqttTlsKey || 'unset'} rejectUnauthorized=${config.mqttTlsRejectUnauthorized}`,
  );

  const subTopic = commandTopic(config.basetopic);
  const client = connect(config.mqttUrl, options);
  client.on('connect', () => {
    log.info('connected to MQTT');
    client.subscribe(subTopic, { qos: 1 }, (err) => {
      if (err) log.error('subscribe error', err);
      else log.info(`subscribed to ${subTopic}`);
    });
  });
  client.on('error', (err) => log.error('mqtt error', err));
  client.on('reconnect', () => log.info('mqtt reconnecting...'));
  client.on('close', () => log.warn('mqtt connection closed'));

  client.on('message', (topic, payload) => {
    try {
      handleInbound(queue, topic, payload);
    } catch (e) {
      log.error(`error handling message on ${topic}:`, e instanceof Error ? e.message : String(e));
    }
  });

  return client;
}
