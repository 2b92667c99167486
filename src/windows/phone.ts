/**
 * Phone calls - ringing, then a scripted conversation typed out turn by turn,
 * then a short pause before the caller hangs up.
 */

import type { CallerScript } from '../content/types';
import type { PhoneCall } from './types';

export interface PhoneTiming {
  msPerChar: number;
  pauseBetweenTurnsMs: number;
  hangUpBufferMs: number;
}

export type CallUpdate = 'idle' | 'changed' | 'missed' | 'ended';

export function createCall(caller: CallerScript, ringTimeoutMs: number): PhoneCall {
  return {
    caller,
    state: 'ringing',
    remainingMs: ringTimeoutMs,
    turn: 0,
    pauseMs: 0,
    typingMs: 0,
    transcript: [],
  };
}

export function answerCall(call: PhoneCall): boolean {
  if (call.state !== 'ringing') return false;
  call.state = 'answered';
  call.remainingMs = 0;
  startTurn(call, 0);
  return true;
}

export function declineCall(call: PhoneCall): boolean {
  if (call.state !== 'ringing') return false;
  call.state = 'ended';
  return true;
}

function startTurn(call: PhoneCall, turn: number) {
  call.turn = turn;
  call.pauseMs = 0;
  call.typingMs = 0;
  const script = call.caller.turns[turn];
  if (script) {
    call.transcript.push({ speaker: script.speaker, text: script.text, shown: 0 });
  }
}

export function conversationDone(call: PhoneCall): boolean {
  return call.turn >= call.caller.turns.length;
}

export function advanceCall(call: PhoneCall, dtMs: number, timing: PhoneTiming): CallUpdate {
  switch (call.state) {
    case 'ended':
      return 'ended';

    case 'ringing':
      call.remainingMs -= dtMs;
      if (call.remainingMs > 0) return 'idle';
      call.state = 'ended';
      return 'missed';

    case 'answered': {
      if (conversationDone(call)) {
        call.remainingMs -= dtMs;
        if (call.remainingMs > 0) return 'idle';
        call.state = 'ended';
        return 'ended';
      }

      const line = call.transcript[call.transcript.length - 1];
      if (line.shown < line.text.length) {
        call.typingMs += dtMs;
        const shown = Math.min(line.text.length, Math.floor(call.typingMs / timing.msPerChar));
        if (shown === line.shown) return 'idle';
        line.shown = shown;
        return 'changed';
      }

      call.pauseMs += dtMs;
      if (call.pauseMs < timing.pauseBetweenTurnsMs) return 'idle';
      startTurn(call, call.turn + 1);
      if (conversationDone(call)) {
        call.remainingMs = timing.hangUpBufferMs;
      }
      return 'changed';
    }
  }
}
