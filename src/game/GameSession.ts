import type { Difficulty, GenerationOptions, Position, ReadonlyBoard } from '../puzzle/types';
import { DIFFICULTIES, DIFFICULTY_LABELS } from '../puzzle/types';
import { formatClock } from '../puzzle/utils/Clock';
import { PuzzleState } from './PuzzleState';
import type { PuzzleView } from './PuzzleState';

export type GamePhase = 'playing' | 'won' | 'paused';

export type SessionLogger = Pick<Console, 'log' | 'warn'>;

export interface SessionSnapshot {
  board: ReadonlyBoard;
  moves: number;
  elapsedMs: number;
  time: string;  // mm:ss
  difficulty: Difficulty | null;
  phase: GamePhase;
  movable: Position[];
}

export interface SolvedEvent {
  moves: number;
  elapsedMs: number;
  difficulty: Difficulty | null;
}

export interface SessionOptions {
  tickIntervalMs?: number;
  logger?: SessionLogger;
  onTick?: (snapshot: SessionSnapshot) => void;
  onSolved?: (event: SolvedEvent) => void;
}

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export function nextDifficulty(current: Difficulty): Difficulty {
  const idx = DIFFICULTIES.indexOf(current);
  return DIFFICULTIES[(idx + 1) % DIFFICULTIES.length];
}

// Drives a PuzzleState the way a UI host would: taps in, ticks and
// completion out. Paused time is left out of the session clock.
export class GameSession {
  // Mutations go through tap, restart and changeDifficulty
  private readonly puzzle: PuzzleState;
  private currentPhase: GamePhase = 'playing';
  private timer: ReturnType<typeof setInterval> | null = null;

  // Offsets measured on the puzzle's own elapsed time
  private pausedTotal = 0;
  private pausedAt: number | null = null;
  private solvedAt: number | null = null;

  private readonly tickIntervalMs: number;
  private readonly logger: SessionLogger;
  private readonly onTick?: (snapshot: SessionSnapshot) => void;
  private readonly onSolved?: (event: SolvedEvent) => void;

  constructor(state: PuzzleState, options: SessionOptions = {}) {
    this.puzzle = state;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.logger = options.logger ?? console;
    this.onTick = options.onTick;
    this.onSolved = options.onSolved;

    this.logStart();
    this.startTimer();
  }

  static start(difficulty: Difficulty, options: SessionOptions & GenerationOptions = {}): GameSession {
    return new GameSession(PuzzleState.generate(difficulty, options), options);
  }

  get state(): PuzzleView {
    return this.puzzle;
  }

  get phase(): GamePhase {
    return this.currentPhase;
  }

  get isTicking(): boolean {
    return this.timer !== null;
  }

  // ============= Player Input =============

  tap(row: number, col: number): boolean {
    if (this.currentPhase !== 'playing') return false;
    if (!this.puzzle.move(row, col)) return false;

    if (this.puzzle.isSolved()) {
      this.solvedAt = this.puzzle.elapsedTime();
      this.currentPhase = 'won';
      this.stopTimer();

      const event: SolvedEvent = {
        moves: this.puzzle.moves,
        elapsedMs: this.elapsedMs(),
        difficulty: this.puzzle.difficulty
      };
      this.logger.log(`Puzzle solved in ${event.moves} moves, ${formatClock(event.elapsedMs)}`);
      this.onSolved?.(event);
    }
    return true;
  }

  pause(): boolean {
    if (this.currentPhase !== 'playing') return false;
    this.pausedAt = this.puzzle.elapsedTime();
    this.currentPhase = 'paused';
    this.stopTimer();
    return true;
  }

  resume(): boolean {
    if (this.currentPhase !== 'paused' || this.pausedAt === null) return false;
    this.pausedTotal += this.puzzle.elapsedTime() - this.pausedAt;
    this.pausedAt = null;
    this.currentPhase = 'playing';
    this.startTimer();
    return true;
  }

  restart(): void {
    this.puzzle.restart();
    this.resetClock();
  }

  changeDifficulty(difficulty: Difficulty): void {
    this.puzzle.changeDifficulty(difficulty);
    this.resetClock();
  }

  // Cycles easy -> medium -> hard -> expert -> easy
  cycleDifficulty(): Difficulty {
    const next = this.puzzle.difficulty === null ? DIFFICULTIES[0] : nextDifficulty(this.puzzle.difficulty);
    this.changeDifficulty(next);
    return next;
  }

  dispose(): void {
    this.stopTimer();
  }

  // ============= Reporting =============

  elapsedMs(): number {
    const end = this.solvedAt ?? this.pausedAt ?? this.puzzle.elapsedTime();
    return Math.max(0, end - this.pausedTotal);
  }

  snapshot(): SessionSnapshot {
    const elapsedMs = this.elapsedMs();
    return {
      board: this.puzzle.board,
      moves: this.puzzle.moves,
      elapsedMs,
      time: formatClock(elapsedMs),
      difficulty: this.puzzle.difficulty,
      phase: this.currentPhase,
      movable: this.currentPhase === 'playing' ? this.puzzle.movableCells() : []
    };
  }

  // ============= Internals =============

  private resetClock(): void {
    this.pausedTotal = 0;
    this.pausedAt = null;
    this.solvedAt = null;
    this.currentPhase = 'playing';
    this.logStart();
    this.startTimer();
  }

  private logStart(): void {
    const difficulty = this.puzzle.difficulty;
    const label = difficulty === null ? `Custom (${this.puzzle.size}×${this.puzzle.size})` : DIFFICULTY_LABELS[difficulty];
    this.logger.log(`Puzzle started: ${label}`);
  }

  private startTimer(): void {
    this.stopTimer();
    this.timer = setInterval(() => this.onTick?.(this.snapshot()), this.tickIntervalMs);
  }

  private stopTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
