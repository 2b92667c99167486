/**
 * Desktop type definitions for window management.
 */

import type { GameWindow } from './window';
import type { Item } from '../windows/types';

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

export const TITLEBAR_HEIGHT = 32;
export const CLOSE_BOX_SIZE = 24;
export const CLOSE_BOX_INSET = 4;

export type Layer = 'desktop' | 'notification' | 'modal';

// Higher layers always stack above lower ones
export const LAYER_RANK: Record<Layer, number> = {
  desktop: 0,
  notification: 1,
  modal: 2,
};

export function rectContains(rect: Rect, point: Point): boolean {
  return point.x >= rect.x && point.x < rect.x + rect.width
    && point.y >= rect.y && point.y < rect.y + rect.height;
}

export type WindowDrag =
  | { state: 'idle' }
  | { state: 'dragging'; offset: Point };

/** What the pointer went down on inside a window's content, from `data-action`. */
export interface ContentTarget {
  action: string;
  arg?: string;
}

export type DragState =
  | { kind: 'idle' }
  | { kind: 'window'; windowId: string }
  | { kind: 'item'; sourceId: string; itemId: string; pointer: Point };

export type PointerDownResult =
  | { kind: 'none' }
  | { kind: 'closed'; window: GameWindow }
  | { kind: 'titlebar'; window: GameWindow }
  | { kind: 'content'; window: GameWindow; target?: ContentTarget };

export type PointerUpResult =
  | { kind: 'none' }
  | { kind: 'window-moved'; window: GameWindow }
  | { kind: 'item-transferred'; source: GameWindow; dest: GameWindow; itemId: string }
  | { kind: 'item-rejected'; source: GameWindow; itemId: string };

export interface CarriedItem {
  item: Item;
  pointer: Point;
}

export interface DesktopScene {
  /** Bottom-first */
  windows: readonly GameWindow[];
  focusedId: string | null;
  carried: CarriedItem | null;
  clock: string;
}

export interface SceneExtras {
  clock: string;
}

export interface EndingSummary {
  elapsed: string;
  itemsMoved: number;
  interruptionsDismissed: number;
  emailsReplied: number;
  callsAnswered: number;
  playerShare: number;
  coworkerShare: number;
  headline: string;
}

export interface Renderer {
  renderDesktop(scene: DesktopScene): void;
  renderEnding(summary: EndingSummary): void;
}
