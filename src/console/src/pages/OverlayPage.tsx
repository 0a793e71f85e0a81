import { useTickFixerState } from '../hooks/useTickFixerState.js';
import { renderTickOverlay } from '../components/TickOverlay.js';

export async function renderOverlayPage(baseUrl?: string): Promise<string | null> {
  const view = await useTickFixerState(baseUrl);
  return renderTickOverlay(view);
}
