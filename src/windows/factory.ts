/**
 * Window factories - every window the game opens, with its geometry and
 * chrome options.
 */

import { GameWindow } from '../desktop/window';
import type { Rect, Size } from '../desktop/types';
import type { CallerScript } from '../content/types';
import { createActivityLog } from './activity-log';
import { createChat } from './chat';
import { createDraft } from './drafts';
import { createFtlHold, createInventory, createZomboidPack } from './items';
import { createOutlook } from './mail';
import { createCall } from './phone';
import type { ChatPlatform, Email, ToastTarget, WindowContent } from './types';

export const APP_SIZE: Size = { width: 800, height: 600 };
export const TOAST_SIZE: Size = { width: 360, height: 110 };
export const PHONE_RINGING_SIZE: Size = { width: 400, height: 220 };
export const PHONE_CALL_SIZE: Size = { width: 400, height: 440 };
export const MILESTONE_SIZE: Size = { width: 480, height: 110 };

export interface Screen {
  width: number;
  height: number;
}

function at(x: number, y: number, size: Size = APP_SIZE): Rect {
  return { x, y, width: size.width, height: size.height };
}

export interface DesktopOptions {
  screen: Screen;
  inboxLimit: number;
  logLimit: number;
  progressMax: number;
}

/** The windows open when the game starts, bottom to top. */
export function createDesktopWindows(options: DesktopOptions): GameWindow[] {
  const logWidth = 350;
  return [
    app('inventory', 'Inventory', at(100, 100), createInventory()),
    app('ftl', 'FTL', at(300, 150), createFtlHold()),
    app('zomboid', 'Project Zomboid', at(500, 200), createZomboidPack()),
    app('outlook', 'Outlook', at(200, 300), createOutlook(options.inboxLimit)),
    app('messages', 'Messages', at(400, 250), createChat('messages')),
    app('slack', 'Slack', at(600, 180), createChat('slack', ['# general', '# conference-planning'])),
    app('discord', 'Discord', at(700, 280), createChat('discord', ['# general'])),
    new GameWindow({
      id: 'activity-log',
      title: 'Activity Log',
      rect: { x: options.screen.width - logWidth - 20, y: 50, width: logWidth, height: options.screen.height - 100 },
      content: createActivityLog(options.logLimit, options.progressMax),
      closable: false,
    }),
  ];
}

// Desktop apps hold game state, so they stay open for the whole session
function app(id: string, title: string, rect: Rect, content: WindowContent): GameWindow {
  return new GameWindow({ id, title, rect, content, closable: false });
}

export function createEmailViewWindow(email: Email, offset: number): GameWindow {
  return new GameWindow({
    id: `email-${email.id}`,
    title: email.subject,
    rect: at(560 + offset, 160 + offset, { width: 640, height: 480 }),
    content: { kind: 'email-view', email },
  });
}

export function createReplyWindow(email: Email, response: string, offset: number): GameWindow {
  return new GameWindow({
    id: `reply-${email.id}`,
    title: `Re: ${email.subject}`,
    rect: at(620 + offset, 220 + offset, { width: 600, height: 380 }),
    content: {
      kind: 'reply',
      emailId: email.id,
      to: email.sender,
      subject: email.subject,
      draft: createDraft(response),
    },
  });
}

// Toasts are placed by stackToasts() every frame
export function createToastWindow(id: string, sequence: number, title: string, heading: string, body: string, target: ToastTarget, lifetimeMs: number): GameWindow {
  return new GameWindow({
    id,
    title,
    rect: at(0, 0, TOAST_SIZE),
    content: { kind: 'popup', popup: { type: 'toast', sequence, heading, body, target, remainingMs: lifetimeMs } },
    layer: 'notification',
    focusable: false,
    movable: false,
  });
}

/** Top edge of a milestone banner; slot 0 is the highest. */
export function milestoneTop(slot: number): number {
  return 120 + slot * (MILESTONE_SIZE.height + 10);
}

export function createMilestoneWindow(id: string, screen: Screen, slot: number, threshold: number, text: string, lifetimeMs: number): GameWindow {
  const y = milestoneTop(slot);
  return new GameWindow({
    id,
    title: 'Progress',
    rect: at((screen.width - MILESTONE_SIZE.width) / 2, y, MILESTONE_SIZE),
    content: { kind: 'popup', popup: { type: 'milestone', threshold, text, remainingMs: lifetimeMs } },
    layer: 'notification',
    focusable: false,
    closable: false,
    movable: false,
  });
}

export function createInterruptWindow(id: string, screen: Screen, from: string, text: string): GameWindow {
  return new GameWindow({
    id,
    title: 'Discord',
    rect: { x: 0, y: 0, width: screen.width, height: screen.height },
    content: { kind: 'popup', popup: { type: 'interrupt', from, text } },
    layer: 'modal',
    modal: true,
    movable: false,
  });
}

export function createPhoneWindow(id: string, screen: Screen, caller: CallerScript, ringTimeoutMs: number): GameWindow {
  return new GameWindow({
    id,
    title: 'Phone',
    rect: at((screen.width - PHONE_RINGING_SIZE.width) / 2, 40, PHONE_RINGING_SIZE),
    content: { kind: 'popup', popup: { type: 'phone', call: createCall(caller, ringTimeoutMs) } },
    layer: 'notification',
    focusable: false,
    closable: false,
    movable: false,
    minSize: PHONE_RINGING_SIZE,
  });
}

export const CHAT_TITLES: Record<ChatPlatform, string> = {
  messages: 'Messages',
  slack: 'Slack',
  discord: 'Discord',
};
