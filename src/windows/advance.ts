/**
 * Per-frame content timers: toast lifetimes, phone calls and the Zomboid
 * scene caption.
 */

import { advanceScene } from './items';
import { advanceCall } from './phone';
import type { PhoneTiming } from './phone';
import type { Popup, WindowContent } from './types';

export interface ContentTiming {
  zomboidSceneMs: number;
  phone: PhoneTiming;
}

/** `expired` means the window should close now. */
export type AdvanceResult = 'idle' | 'changed' | 'expired';

function advancePopup(popup: Popup, dtMs: number, timing: ContentTiming): AdvanceResult {
  switch (popup.type) {
    case 'toast':
    case 'milestone':
      popup.remainingMs -= dtMs;
      return popup.remainingMs <= 0 ? 'expired' : 'idle';

    case 'interrupt':
      return 'idle';

    case 'phone': {
      const update = advanceCall(popup.call, dtMs, timing.phone);
      if (update === 'missed' || update === 'ended') return 'expired';
      return update;
    }
  }
}

export function advanceContent(content: WindowContent, dtMs: number, timing: ContentTiming): AdvanceResult {
  switch (content.kind) {
    case 'zomboid':
      return advanceScene(content, dtMs, timing.zomboidSceneMs) ? 'changed' : 'idle';
    case 'popup':
      return advancePopup(content.popup, dtMs, timing);
    default:
      return 'idle';
  }
}
