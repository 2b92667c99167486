export { GameWindow } from './window';
export type { WindowOptions } from './window';
export { WindowManager } from './window-manager';
export { DomRenderer } from './renderer';
export { escapeHtml, formatClock } from './html';
export * from './types';
