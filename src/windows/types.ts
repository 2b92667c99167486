/**
 * Window content variants. Every window on the desktop carries exactly one of
 * these, tagged by `kind`.
 */

import type { CallerScript, Speaker } from '../content/types';

export interface Item {
  id: string;
  name: string;
  icon: string;
}

export interface ItemContainer {
  items: Item[];
  capacity: number;
}

export interface InventoryContent extends ItemContainer {
  kind: 'inventory';
  columns: number;
  rows: number;
}

export interface FtlContent extends ItemContainer {
  kind: 'ftl';
}

export interface ZomboidContent extends ItemContainer {
  kind: 'zomboid';
  scene: number;
  sceneElapsedMs: number;
}

export type ItemContent = InventoryContent | FtlContent | ZomboidContent;

export interface Email {
  id: number;
  sender: string;
  subject: string;
  time: string;
  message: string;
  responses: string[];
  read: boolean;
  replied: boolean;
  urgent: boolean;
}

export interface OutlookContent {
  kind: 'outlook';
  emails: Email[];
  limit: number;
  nextId: number;
}

export interface EmailViewContent {
  kind: 'email-view';
  email: Email;
}

/** Text the player "types" one key press at a time. */
export interface Draft {
  text: string;
  typed: number;
}

export interface ReplyContent {
  kind: 'reply';
  emailId: number;
  to: string;
  subject: string;
  draft: Draft;
}

export type ChatPlatform = 'messages' | 'slack' | 'discord';

export interface ChatMessage {
  from: string;
  text: string;
  mine: boolean;
}

export interface ChatThread {
  name: string;
  messages: ChatMessage[];
  unread: number;
}

export type ComposeState =
  | { step: 'idle' }
  | { step: 'choosing'; options: string[] }
  | { step: 'typing'; draft: Draft };

export interface ChatContent {
  kind: ChatPlatform;
  threads: ChatThread[];
  selected: number;
  compose: ComposeState;
}

export interface ActivityEntry {
  time: string;
  text: string;
}

export interface ActivityLogContent {
  kind: 'activity-log';
  entries: ActivityEntry[];
  limit: number;
  progress: number;
  max: number;
}

export type ToastTarget =
  | { kind: 'email'; emailId: number }
  | { kind: 'chat'; platform: ChatPlatform; thread: string };

export interface ToastPopup {
  type: 'toast';
  /** Spawn order among the open toasts */
  sequence: number;
  heading: string;
  body: string;
  target: ToastTarget;
  remainingMs: number;
}

export interface MilestonePopup {
  type: 'milestone';
  threshold: number;
  text: string;
  remainingMs: number;
}

export interface InterruptPopup {
  type: 'interrupt';
  from: string;
  text: string;
}

export type CallState = 'ringing' | 'answered' | 'ended';

export interface TranscriptLine {
  speaker: Speaker;
  text: string;
  shown: number;
}

export interface PhoneCall {
  caller: CallerScript;
  state: CallState;
  /** Time left to answer while ringing, or before hanging up once the script is done */
  remainingMs: number;
  turn: number;
  pauseMs: number;
  typingMs: number;
  transcript: TranscriptLine[];
}

export interface PhonePopup {
  type: 'phone';
  call: PhoneCall;
}

export type Popup = ToastPopup | MilestonePopup | InterruptPopup | PhonePopup;

export interface PopupContent {
  kind: 'popup';
  popup: Popup;
}

export type WindowContent =
  | InventoryContent
  | FtlContent
  | ZomboidContent
  | OutlookContent
  | EmailViewContent
  | ReplyContent
  | ChatContent
  | ActivityLogContent
  | PopupContent;

export type WindowKind = WindowContent['kind'];

export function isItemContent(content: WindowContent): content is ItemContent {
  return content.kind === 'inventory' || content.kind === 'ftl' || content.kind === 'zomboid';
}

export function isChatContent(content: WindowContent): content is ChatContent {
  return content.kind === 'messages' || content.kind === 'slack' || content.kind === 'discord';
}
