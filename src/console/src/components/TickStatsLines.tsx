import type { OverlayColor, OverlayLine, TickStatsView } from '../types.js';
import { line } from './OverlayLine.js';

const IDEAL_TICK_MS = 600;
const JITTER_WARN_MS = 30;

export function qualityColor(quality: number): OverlayColor {
  if (quality >= 95) return 'green';
  if (quality >= 80) return 'yellow';
  if (quality >= 60) return 'orange';
  return 'red';
}

export function tickStatsLines(ticks: TickStatsView): OverlayLine[] {
  if (ticks.waiting) return [line('Status', 'Waiting...', 'yellow')];

  const lines = [
    line('Tick Quality', `${ticks.quality.toFixed(1)}%`, qualityColor(ticks.quality)),
    line('Avg Tick', `${ticks.averageMs.toFixed(0)}ms`),
    line('Jitter', `${ticks.jitterMs.toFixed(1)}ms`, ticks.jitterMs > JITTER_WARN_MS ? 'orange' : 'white')
  ];
  if (ticks.lastDeltaMs >= 0) {
    const onTime = Math.abs(ticks.lastDeltaMs - IDEAL_TICK_MS) <= ticks.thresholdMs;
    lines.push(line('Last Tick', `${ticks.lastDeltaMs}ms`, onTime ? 'green' : 'red'));
  }
  return lines;
}
