import type { TickFixerStatus } from '../types.js';
import { Counters } from './counters.js';

export function buildStatusSummary(status: TickFixerStatus, counters: Counters, adapterConnections: number) {
  return {
    ...status,
    events: {
      adapterConnections,
      adapterConnectionsTotal: counters.adapterConnectionsTotal,
      ticksReceivedTotal: counters.ticksReceivedTotal,
      gameStateChangesTotal: counters.gameStateChangesTotal,
      rejectedMessagesTotal: counters.rejectedMessagesTotal,
      wsCloseByCode: counters.wsCloseTotal
    }
  };
}
