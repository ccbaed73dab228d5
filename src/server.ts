import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { serve } from '@hono/node-server';
import { connect } from 'mqtt';

import { AlarmMonitor } from './alarms';
import { AnalyticsEngine } from './analytics';
import { createApp } from './app';
import { envFromProcess, resolveConfig } from './config';
import type { AppConfig } from './config';
import { MetricPipeline } from './ingest';
import { readCatalogFile } from './lib/catalog';
import { openDatabase } from './lib/db';
import { SqliteMetricStore } from './storage';
import { GatewaySubscriber, gatewayTopics } from './transport';
import { applyLogLevel } from './utils/log-level';

export async function start(config: AppConfig) {
  applyLogLevel(config.logLevel);

  const catalog = await readCatalogFile(config.brand, config.catalogDir);
  console.info('Pump capabilities', catalog.capabilities);

  if (config.dbPath !== ':memory:') {
    await mkdir(path.dirname(config.dbPath), { recursive: true });
  }
  const db = await openDatabase(config.dbPath);
  const store = new SqliteMetricStore(db);

  const pipeline = new MetricPipeline(catalog, store, {
    storageTimeoutMs: config.storageTimeoutMs,
    normalizer: config.normalizer,
  });
  const subscriber = new GatewaySubscriber(pipeline);
  const analytics = new AnalyticsEngine(store, catalog, {
    storageTimeoutMs: config.storageTimeoutMs,
    latestLookbackHours: config.latestLookbackHours,
    hotWaterMinCycleSeconds: config.hotWaterMinCycleSeconds,
    copModel: config.copModel,
  });
  const alarms = new AlarmMonitor(store, catalog, {
    storageTimeoutMs: config.storageTimeoutMs,
    alarmLookbackHours: config.alarmLookbackHours,
  });

  const client = connect(config.mqttUrl, {
    clientId: config.mqttClientId,
    username: config.mqttUsername,
    password: config.mqttPassword,
    reconnectPeriod: 5000,
    connectTimeout: config.storageTimeoutMs * 2,
  });
  const topics = gatewayTopics(config.gatewayId);

  client.on('connect', () => {
    console.info('Connected to MQTT broker', config.mqttUrl);
    client.subscribe(topics, { qos: 0 }, (error) => {
      if (error) {
        console.error('MQTT subscribe failed', error);
        return;
      }
      console.info('Subscribed', topics);
    });
  });
  client.on('reconnect', () => console.info('Reconnecting to MQTT broker'));
  client.on('offline', () => console.warn('MQTT broker offline'));
  client.on('error', (error) => console.error('MQTT error', error.message));
  client.on('message', (topic, payload) => {
    subscriber.onMessage(topic, payload).catch((error: unknown) => {
      console.error('Unhandled ingest failure', topic, error);
    });
  });

  const app = createApp({
    db,
    catalog,
    analytics,
    alarms,
    pipeline,
    config: {
      electricityPrice: config.electricityPrice,
      updateIntervalSeconds: config.updateIntervalSeconds,
      apiJwtSecret: config.apiJwtSecret,
    },
  });
  const server = serve({ fetch: app.fetch, port: config.httpPort }, (info) => {
    console.info(`HTTP API listening on :${info.port}`);
  });

  const shutdown = async () => {
    console.info('Shutting down');
    server.close();
    await client.endAsync();
    await subscriber.idle();
    db.close();
  };
  return { app, server, client, shutdown };
}

async function main() {
  const config = resolveConfig(envFromProcess(process.env));
  const { shutdown } = await start(config);
  const stop = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

main().catch((error: unknown) => {
  console.error('Failed to start', error);
  process.exit(1);
});
