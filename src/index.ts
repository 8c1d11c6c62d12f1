// Sliding tiles engine

export * from './puzzle';
export { PuzzleState } from './game/PuzzleState';
export type { PuzzleStats, FromBoardOptions, PuzzleView } from './game/PuzzleState';
export { GameSession, nextDifficulty, DEFAULT_TICK_INTERVAL_MS } from './game/GameSession';
export type {
  GamePhase,
  SessionLogger,
  SessionOptions,
  SessionSnapshot,
  SolvedEvent
} from './game/GameSession';
export { BoardView, TILE_COLOR, MOVABLE_COLOR } from './board/BoardView';
export type { BoardViewOptions } from './board/BoardView';
