import WebSocket from 'ws';
import type { GameState, GameStateMessage, GameTickMessage, HelloMessage } from './shared/protocol.js';

export const ADAPTER_VERSION = '0.1.0';

export interface GameAdapter {
  readonly ws: WebSocket;
  sendTick(): boolean;
  sendGameState(state: GameState): boolean;
  close(): void;
}

/**
 * Game-side half of the event transport: reports ticks and game state changes
 * to the tick-fixer service. Sends return false while the socket is not open.
 */
export function connectGameAdapter(serverUrl: string, client = 'game-adapter'): GameAdapter {
  const ws = new WebSocket(serverUrl);
  ws.on('open', () => {
    sendHello(ws, client);
  });
  // 'close' follows every error.
  ws.on('error', (error) => {
    console.warn(`[adapter] connection error: ${error.message}`);
  });

  return {
    ws,
    sendTick: () => sendJson(ws, { type: 'game_tick', ts: Date.now() } satisfies GameTickMessage),
    sendGameState: (state) => sendJson(ws, { type: 'game_state', state, ts: Date.now() } satisfies GameStateMessage),
    close: () => ws.close(1000)
  };
}

export function sendHello(ws: WebSocket, client: string): boolean {
  const msg: HelloMessage = { type: 'hello', client, version: ADAPTER_VERSION, ts: Date.now() };
  return sendJson(ws, msg);
}

function sendJson(ws: WebSocket, payload: unknown): boolean {
  if (ws.readyState !== WebSocket.OPEN) return false;
  ws.send(JSON.stringify(payload));
  return true;
}
