// Puzzle system types

// ============= Basic Types =============

export type Difficulty = 'easy' | 'medium' | 'hard' | 'expert';
export type Direction = 'up' | 'down' | 'left' | 'right';

// 0 is the blank
export type Tile = number;
export type Board = Tile[][];
export type ReadonlyBoard = ReadonlyArray<ReadonlyArray<Tile>>;

export interface Position {
  row: number;
  col: number;
}

export const BLANK: Tile = 0;

// ============= Difficulty Tables =============

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard', 'expert'];

export const DIFFICULTY_SIZES: Readonly<Record<Difficulty, number>> = {
  easy: 3,
  medium: 4,
  hard: 5,
  expert: 6
};

export const DIFFICULTY_LABELS: Readonly<Record<Difficulty, string>> = {
  easy: 'Easy (3×3)',
  medium: 'Medium (4×4)',
  hard: 'Hard (5×5)',
  expert: 'Expert (6×6)'
};

export const DIRECTION_OFFSETS: Readonly<Record<Direction, Position>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 }
};

// ============= Injected Capabilities =============

// Uniform in [0, 1), same contract as Math.random
export type Rng = () => number;

export interface Clock {
  now(): number;  // epoch milliseconds
}

// ============= Generator Types =============

export interface GenerationOptions {
  rng?: Rng;
  clock?: Clock;
  size?: number;  // overrides the difficulty's board size
}

export interface GeneratedBoard {
  board: Board;
  blank: Position;
  repaired: boolean;  // parity repair was applied
}

// ============= Utility Functions =============

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some(d => d === value);
}

export function difficultyForSize(size: number): Difficulty | null {
  return DIFFICULTIES.find(d => DIFFICULTY_SIZES[d] === size) ?? null;
}

export function cloneBoard(board: ReadonlyBoard): Board {
  return board.map(row => [...row]);
}
