import type { OverlayView } from '../types.js';
import { keepaliveLine } from './KeepaliveLine.js';
import { renderOverlayLine } from './OverlayLine.js';
import { tickStatsLines } from './TickStatsLines.js';

export const OVERLAY_TITLE = 'Tick Fixer';

/** null when the overlay is switched off. */
export function renderTickOverlay(view: OverlayView): string | null {
  if (!view.showOverlay) return null;
  const lines = view.ticks ? tickStatsLines(view.ticks) : [];
  lines.push(keepaliveLine(view.keepalive));
  return [OVERLAY_TITLE, ...lines.map(renderOverlayLine)].join('\n');
}
