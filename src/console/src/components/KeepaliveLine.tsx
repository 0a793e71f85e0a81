import type { KeepaliveStatusView, OverlayColor, OverlayLine } from '../types.js';
import { line } from './OverlayLine.js';

const colors: Record<KeepaliveStatusView, OverlayColor> = { OFF: 'gray', PAUSED: 'yellow', ACTIVE: 'green' };

export function keepaliveLine(status: KeepaliveStatusView): OverlayLine {
  return line('Keepalive', status, colors[status]);
}
