export { Game } from './game';
export type { GameOptions } from './game';
export { FrameLoop, MAX_FRAME_MS } from './loop';
export type { FrameScheduler } from './loop';
export { InputController, targetOf } from './input';
export type { GameInput, InputSink } from './input';
export { ProgressTracker } from './progress';
export { createGameState, createStats, credit } from './state';
export type { GamePhase, GameState, GameStats, WorkSource } from './state';
export { summarize, formatElapsed } from './ending';
export { officeClock } from './clock';
