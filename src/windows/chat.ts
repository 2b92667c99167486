/**
 * Chat windows (Messages, Slack, Discord) - threads of messages plus the
 * reply flow: pick a thread, press Reply, choose a canned line, type it out,
 * send.
 */

import { createDraft, isComplete, typeNext } from './drafts';
import type { ChatContent, ChatPlatform, ChatThread } from './types';

export const CHAT_REPLY_OPTIONS = ['Okay', 'Got it', 'Thanks', 'Will do', 'Sure thing'];

export const PLAYER_NAME = 'You';

export function createChat(platform: ChatPlatform, threadNames: string[] = []): ChatContent {
  return {
    kind: platform,
    threads: threadNames.map(name => ({ name, messages: [], unread: 0 })),
    selected: -1,
    compose: { step: 'idle' },
  };
}

export function findThread(chat: ChatContent, name: string): number {
  return chat.threads.findIndex(thread => thread.name === name);
}

export function selectedThread(chat: ChatContent): ChatThread | undefined {
  return chat.selected >= 0 ? chat.threads[chat.selected] : undefined;
}

/** Append an incoming message, creating the thread on first contact. */
export function receiveMessage(chat: ChatContent, threadName: string, from: string, text: string): number {
  let index = findThread(chat, threadName);
  if (index < 0) {
    chat.threads.push({ name: threadName, messages: [], unread: 0 });
    index = chat.threads.length - 1;
  }
  const thread = chat.threads[index];
  thread.messages.push({ from, text, mine: false });
  if (index !== chat.selected) {
    thread.unread++;
  }
  return index;
}

export function selectThread(chat: ChatContent, index: number): boolean {
  const thread = chat.threads[index];
  if (!thread) return false;
  chat.selected = index;
  thread.unread = 0;
  chat.compose = { step: 'idle' };
  return true;
}

export function startCompose(chat: ChatContent): boolean {
  if (!selectedThread(chat) || chat.compose.step !== 'idle') return false;
  chat.compose = { step: 'choosing', options: [...CHAT_REPLY_OPTIONS] };
  return true;
}

export function chooseReply(chat: ChatContent, index: number): boolean {
  if (chat.compose.step !== 'choosing') return false;
  const text = chat.compose.options[index];
  if (text === undefined) return false;
  chat.compose = { step: 'typing', draft: createDraft(text) };
  return true;
}

export function typeReply(chat: ChatContent): boolean {
  return chat.compose.step === 'typing' && typeNext(chat.compose.draft);
}

/** Send the typed reply to the selected thread. Only a complete draft sends. */
export function sendReply(chat: ChatContent): boolean {
  const thread = selectedThread(chat);
  if (!thread || chat.compose.step !== 'typing' || !isComplete(chat.compose.draft)) return false;
  thread.messages.push({ from: PLAYER_NAME, text: chat.compose.draft.text, mine: true });
  chat.compose = { step: 'idle' };
  return true;
}

export function totalUnread(chat: ChatContent): number {
  return chat.threads.reduce((sum, thread) => sum + thread.unread, 0);
}
