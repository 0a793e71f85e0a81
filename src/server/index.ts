import http from 'node:http';
import { config } from './config.js';
import { createApp } from './app.js';
import { Counters } from './metrics/counters.js';
import { TickFixer } from './plugin/tick-fixer.js';
import { SettingsStore } from './settings/settings-store.js';
import { ConnectionManager } from './transport/connection-manager.js';
import { mountWsServer } from './transport/ws-server.js';
import { createLogger, describeError } from './logging/logger.js';

const log = createLogger('tick-fixer');

const settingsStore = new SettingsStore(config.settings.path, config.settings.flushMs);
const settings = await settingsStore.loadSettings();

const tickFixer = new TickFixer(settings, {
  allowPublicFallback: config.keepalive.allowPublicFallback,
  shutdownGraceMs: config.keepalive.shutdownGraceMs
});
const connectionManager = new ConnectionManager();
const counters = new Counters();
const ctx = { port: config.port, tickFixer, settingsStore, connectionManager, counters };

const server = http.createServer(createApp(ctx));
const wss = mountWsServer(server, ctx);

await tickFixer.startUp();

server.on('error', (error) => {
  log.error(`server error: ${describeError(error)}`);
  process.exitCode = 1;
  void stop();
});

server.listen(config.port, () => {
  log.info(`listening on ${config.port}`);
});

let stopping = false;
async function stop(): Promise<void> {
  if (stopping) return;
  stopping = true;
  for (const ws of wss.clients) ws.close(1001, 'shutting down');
  wss.close();
  server.close();
  try {
    await tickFixer.shutDown();
  } catch (error) {
    log.error(`shutdown failed: ${describeError(error)}`);
  }
  await settingsStore.flush();
}

process.once('SIGINT', () => void stop());
process.once('SIGTERM', () => void stop());
