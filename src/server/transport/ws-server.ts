import { WebSocketServer } from 'ws';
import type { Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import { parseAdapterEvent, validateHello } from './ws-protocol.js';
import type { TickFixerContext } from '../api/types.js';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('ws');

export function mountWsServer(server: Server, ctx: TickFixerContext): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  wss.on('connection', (ws) => {
    const connId = randomUUID();
    let helloDone = false;

    ws.on('message', (raw) => {
      const msg = parseAdapterEvent(raw.toString());
      if (!msg) {
        ctx.counters.rejectedMessagesTotal += 1;
        ws.close(1003, 'malformed message');
        return;
      }

      if (!helloDone) {
        const valid = validateHello(msg);
        if (!valid.ok) {
          ctx.counters.rejectedMessagesTotal += 1;
          ws.close(1008, valid.reason);
          return;
        }
        helloDone = true;
        const { client, version } = valid.hello;
        ctx.connectionManager.registerConnection(connId, client, version, Date.now());
        ctx.counters.adapterConnectionsTotal += 1;
        log.info(`adapter ${client} ${version} connected`);
        return;
      }

      if (msg.type === 'game_tick') {
        ctx.counters.ticksReceivedTotal += 1;
        ctx.tickFixer.onGameTick();
      } else if (msg.type === 'game_state') {
        ctx.counters.gameStateChangesTotal += 1;
        ctx.tickFixer.onGameStateChanged(msg.state);
      }
    });

    ws.on('error', (error) => {
      log.warn(`adapter socket error: ${describeError(error)}`);
    });

    ws.on('close', (code) => {
      ctx.counters.markWsClose(code);
      const conn = ctx.connectionManager.unregisterConnection(connId);
      if (conn) log.info(`adapter ${conn.client} disconnected (${code})`);
    });
  });

  server.on('upgrade', (req, socket, head) => {
    const url = req.url || '';
    if (!url.startsWith('/ws')) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  return wss;
}
