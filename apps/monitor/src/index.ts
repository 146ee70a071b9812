import 'dotenv/config';
import { serve } from '@hono/node-server';
import { validateConfig, type AppConfig } from './config/validate';
import { createQueryApp } from './app';
import { loadDeviceRegistry, type DeviceRegistry } from './services/deviceRegistry';
import { FileMonitorStore } from './services/monitorStore';
import { MonitorEngine } from './services/monitorEngine';
import { SnmpGatewayReader } from './services/snmpGatewayReader';
import { createDeliveryNotifier, createEngineNotifier } from './services/notifierSetup';
import { closeRedis, getRedis, isRedisAvailable } from './services/redis';
import { initializePollWorker, shutdownPollWorker } from './jobs/pollWorker';
import {
  getNotificationQueue,
  initializeNotificationWorker,
  shutdownNotificationWorker
} from './jobs/notificationWorker';

type ServerHandle = ReturnType<typeof serve>;

async function startPoller(config: AppConfig, registry: DeviceRegistry, store: FileMonitorStore): Promise<void> {
  if (!config.SNMP_GATEWAY_URL) {
    throw new Error('SNMP_GATEWAY_URL is required to run the poller');
  }

  await initializeNotificationWorker(createDeliveryNotifier(config));

  const engine = new MonitorEngine({
    devices: registry.devices,
    reader: new SnmpGatewayReader({ baseUrl: config.SNMP_GATEWAY_URL, token: config.SNMP_GATEWAY_TOKEN }),
    store,
    notifier: createEngineNotifier(config, { queue: getNotificationQueue(), redis: getRedis }),
    timeZone: config.MONITOR_TIMEZONE,
    concurrency: config.POLL_CONCURRENCY,
    deviceTimeoutMs: config.DEVICE_TIMEOUT_MS,
    maxBytesPerSecond: config.MAX_LINK_BYTES_PER_SECOND,
    recipients: new Set(config.TELEGRAM_CHAT_IDS)
  });

  // Unreadable state must stop startup rather than reset counters and alerts
  await engine.initialize();
  await initializePollWorker(engine, config.POLL_INTERVAL_SECONDS);
}

function startQueryApi(config: AppConfig, registry: DeviceRegistry, store: FileMonitorStore): ServerHandle {
  const app = createQueryApp({
    registry,
    store,
    timeZone: config.MONITOR_TIMEZONE,
    exposeErrors: config.NODE_ENV === 'development'
  });

  const server = serve({ fetch: app.fetch, port: config.API_PORT });
  console.log(`[QueryApi] Listening on http://localhost:${config.API_PORT}`);
  return server;
}

async function main(): Promise<void> {
  const config = validateConfig();
  const registry = await loadDeviceRegistry(config.DEVICES_FILE);
  const store = new FileMonitorStore(config.DATA_DIR);

  console.log(
    `[Monitor] Starting with ${registry.devices.length} device(s)` +
      (registry.errors.length > 0 ? `, ${registry.errors.length} skipped` : '')
  );

  let server: ServerHandle | null = null;

  if (config.ENABLE_POLLER) {
    await startPoller(config, registry, store);
  }
  if (config.ENABLE_QUERY_API) {
    server = startQueryApi(config, registry, store);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Monitor] ${signal} received, shutting down`);

    try {
      if (server) {
        server.close();
      }
      if (config.ENABLE_POLLER) {
        await shutdownPollWorker();
        await shutdownNotificationWorker();
      }
      if (isRedisAvailable()) {
        await closeRedis();
      }
      process.exit(0);
    } catch (error) {
      console.error('[Monitor] Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('[CRITICAL] [Monitor] Startup failed:', error);
  process.exit(1);
});
