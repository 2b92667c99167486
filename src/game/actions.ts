/**
 * Player actions - what a click on a `data-action` element inside a window,
 * or a key press, does to the game.
 */

import { chooseReply, findThread, selectThread, sendReply, startCompose, typeReply } from '../windows/chat';
import { isComplete, typeNext } from '../windows/drafts';
import { createEmailViewWindow, createReplyWindow, PHONE_CALL_SIZE } from '../windows/factory';
import { findEmail, markRead, markReplied } from '../windows/mail';
import { answerCall, declineCall } from '../windows/phone';
import { isChatContent } from '../windows/types';
import type { ChatContent, Email, OutlookContent, ToastTarget } from '../windows/types';
import type { ContentTarget } from '../desktop/types';
import type { GameWindow } from '../desktop/window';
import type { SchedulerContext } from '../notifications/scheduler';
import { credit } from './state';

const CASCADE = 30;

function outlookOf(ctx: SchedulerContext): { win: GameWindow; content: OutlookContent } | null {
  const win = ctx.manager.get('outlook');
  if (!win || win.content.kind !== 'outlook') return null;
  return { win, content: win.content };
}

function cascadeOffset(ctx: SchedulerContext, prefix: string): number {
  const open = ctx.manager.windows().filter(win => win.id.startsWith(prefix)).length;
  return (open % 5) * CASCADE;
}

function focusOrSpawn(ctx: SchedulerContext, id: string, create: () => GameWindow): GameWindow {
  const existing = ctx.manager.get(id);
  if (existing) {
    ctx.manager.focus(id);
    return existing;
  }
  return ctx.manager.spawn(create());
}

export function openEmail(ctx: SchedulerContext, emailId: number): GameWindow | null {
  const outlook = outlookOf(ctx);
  const email = outlook && findEmail(outlook.content, emailId);
  if (!outlook || !email) {
    console.warn(`[Game] Email ${emailId} not found`);
    return null;
  }
  if (markRead(outlook.content, emailId)) outlook.win.touch();
  return focusOrSpawn(ctx, `email-${email.id}`, () => createEmailViewWindow(email, cascadeOffset(ctx, 'email-')));
}

function openReply(ctx: SchedulerContext, email: Email, responseIndex: number): GameWindow | null {
  const response = email.responses[responseIndex];
  if (response === undefined) return null;
  return focusOrSpawn(ctx, `reply-${email.id}`, () => createReplyWindow(email, response, cascadeOffset(ctx, 'reply-')));
}

function sendEmailReply(ctx: SchedulerContext, win: GameWindow): boolean {
  if (win.content.kind !== 'reply' || !isComplete(win.content.draft)) return false;

  const outlook = outlookOf(ctx);
  if (outlook && markReplied(outlook.content, win.content.emailId)) {
    outlook.win.touch();
  }
  ctx.state.stats.emailsReplied++;
  credit(ctx.state, 'player', ctx.config.work.replySent);
  ctx.manager.close(win.id);
  return true;
}

function openChatThread(ctx: SchedulerContext, target: Extract<ToastTarget, { kind: 'chat' }>): GameWindow | null {
  const win = ctx.manager.get(target.platform);
  if (!win || !isChatContent(win.content)) return null;
  const index = findThread(win.content, target.thread);
  if (index >= 0) selectThread(win.content, index);
  win.touch();
  ctx.manager.focus(win.id);
  return win;
}

/** Closing an interruption by hand counts as dismissing it. */
export function dismissInterruption(ctx: SchedulerContext) {
  ctx.state.stats.interruptionsDismissed++;
  credit(ctx.state, 'player', ctx.config.work.interruptionDismissed);
}

/** A window the player closed with its close box. */
export function onClosedByPlayer(ctx: SchedulerContext, win: GameWindow) {
  if (win.content.kind !== 'popup') return;
  const type = win.content.popup.type;
  if (type === 'interrupt' || type === 'toast') {
    dismissInterruption(ctx);
  }
}

function handleChatAction(ctx: SchedulerContext, chat: ChatContent, target: ContentTarget): boolean {
  const index = Number(target.arg);
  switch (target.action) {
    case 'select-thread': return selectThread(chat, index);
    case 'compose': return startCompose(chat);
    case 'choose': return chooseReply(chat, index);
    case 'send': {
      if (!sendReply(chat)) return false;
      credit(ctx.state, 'player', ctx.config.work.replySent);
      return true;
    }
    default: return false;
  }
}

/**
 * Run the action behind a clicked element. Returns whether anything
 * happened.
 */
export function handleAction(ctx: SchedulerContext, win: GameWindow, target: ContentTarget): boolean {
  const content = win.content;

  if (isChatContent(content)) {
    const changed = handleChatAction(ctx, content, target);
    if (changed) win.touch();
    return changed;
  }

  switch (content.kind) {
    case 'outlook':
      return target.action === 'open-email' && openEmail(ctx, Number(target.arg)) !== null;

    case 'email-view':
      return target.action === 'respond' && openReply(ctx, content.email, Number(target.arg)) !== null;

    case 'reply':
      return target.action === 'send' && sendEmailReply(ctx, win);

    case 'popup': {
      const popup = content.popup;
      if (popup.type === 'toast' && target.action === 'open-toast') {
        ctx.manager.close(win.id);
        const opened = popup.target.kind === 'email'
          ? openEmail(ctx, popup.target.emailId)
          : openChatThread(ctx, popup.target);
        return opened !== null;
      }
      if (popup.type === 'interrupt' && target.action === 'dismiss') {
        ctx.manager.close(win.id);
        dismissInterruption(ctx);
        return true;
      }
      if (popup.type === 'phone' && target.action === 'answer' && answerCall(popup.call)) {
        ctx.state.stats.callsAnswered++;
        win.resize(PHONE_CALL_SIZE);
        return true;
      }
      if (popup.type === 'phone' && target.action === 'decline' && declineCall(popup.call)) {
        ctx.manager.close(win.id);
        dismissInterruption(ctx);
        return true;
      }
      return false;
    }

    default:
      if (target.action !== 'item') {
        console.warn(`[Game] Unknown action "${target.action}" in ${win.kind}`);
      }
      return false;
  }
}

/** A key press types into the focused window's draft, if it has one. */
export function typeInto(win: GameWindow): boolean {
  const content = win.content;
  const typed = content.kind === 'reply'
    ? typeNext(content.draft)
    : isChatContent(content) && typeReply(content);
  if (typed) win.touch();
  return typed;
}
