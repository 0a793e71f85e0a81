import type { OverlayColor, OverlayLine } from '../types.js';

export function line(left: string, right: string, color: OverlayColor = 'white'): OverlayLine {
  return { left, right, color };
}

export function renderOverlayLine(l: OverlayLine): string {
  return `${l.left}=${l.right} [${l.color}]`;
}
