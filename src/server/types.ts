import type { GameState } from '../adapter/shared/protocol.js';

export type { GameState };

export type KeepaliveStatus = 'OFF' | 'PAUSED' | 'ACTIVE';

export interface TickStats {
  waiting: boolean;
  quality: number;
  averageMs: number;
  jitterMs: number;
  lastDeltaMs: number;
  samples: number;
  capacity: number;
  thresholdMs: number;
}

export interface KeepaliveView {
  status: KeepaliveStatus;
  target: string | null;
  port: number | null;
  intervalMs: number;
  totalSent: number;
  totalErrors: number;
}

export interface TickFixerStatus {
  gameState: GameState;
  ticks: TickStats | null;
  keepalive: KeepaliveView;
}
