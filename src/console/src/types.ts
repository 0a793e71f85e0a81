export type OverlayColor = 'white' | 'green' | 'yellow' | 'orange' | 'red' | 'gray';

export interface TickStatsView {
  waiting: boolean;
  quality: number;
  averageMs: number;
  jitterMs: number;
  lastDeltaMs: number;
  thresholdMs: number;
}

export type KeepaliveStatusView = 'OFF' | 'PAUSED' | 'ACTIVE';

export interface OverlayView {
  showOverlay: boolean;
  ticks: TickStatsView | null;
  keepalive: KeepaliveStatusView;
}

export interface OverlayLine {
  left: string;
  right: string;
  color: OverlayColor;
}
