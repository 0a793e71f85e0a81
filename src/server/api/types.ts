import { Counters } from '../metrics/counters.js';
import { SettingsStore } from '../settings/settings-store.js';
import { TickFixer } from '../plugin/tick-fixer.js';
import { ConnectionManager } from '../transport/connection-manager.js';

export interface AdapterConnection {
  connId: string;
  client: string;
  version: string;
  connectedAt: number;
}

export interface TickFixerContext {
  port: number;
  tickFixer: TickFixer;
  settingsStore: SettingsStore;
  connectionManager: ConnectionManager;
  counters: Counters;
}
