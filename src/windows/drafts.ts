/**
 * Typing drafts - every key press reveals the next character of a canned
 * reply, whatever key it was.
 */

import type { Draft } from './types';

export function createDraft(text: string): Draft {
  return { text, typed: 0 };
}

/** Type one more character. Returns false once the draft is complete. */
export function typeNext(draft: Draft): boolean {
  if (isComplete(draft)) return false;
  draft.typed++;
  return true;
}

export function isComplete(draft: Draft): boolean {
  return draft.typed >= draft.text.length;
}

export function visibleText(draft: Draft): string {
  return draft.text.slice(0, draft.typed);
}
