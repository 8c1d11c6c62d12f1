import { describe, it, expect, expectTypeOf, vi, beforeEach, afterEach } from 'vitest'
import { GameSession, nextDifficulty } from './GameSession'
import type { SessionLogger, SessionSnapshot, SolvedEvent } from './GameSession'
import { PuzzleState } from './PuzzleState'
import { BoardView } from '../board/BoardView'
import * as THREE from 'three'
import { ManualClock } from '../puzzle/utils/Clock'
import { createSeededRng } from '../puzzle/utils/Random'

// One slide (2,2) away from solved
const ALMOST_SOLVED = [[1, 2, 3], [4, 5, 6], [7, 0, 8]]

describe('GameSession', () => {
  let clock: ManualClock
  let logger: SessionLogger
  let session: GameSession | null

  beforeEach(() => {
    vi.useFakeTimers()
    clock = new ManualClock(0)
    logger = { log: vi.fn(), warn: vi.fn() }
    session = null
  })

  afterEach(() => {
    session?.dispose()
    vi.useRealTimers()
  })

  function startSession(rows = ALMOST_SOLVED, extra: {
    onTick?: (s: SessionSnapshot) => void
    onSolved?: (e: SolvedEvent) => void
  } = {}): GameSession {
    const state = PuzzleState.fromBoard(rows, { clock, rng: createSeededRng(4) })
    session = new GameSession(state, { logger, ...extra })
    return session
  }

  it('starts in the playing phase and logs the puzzle', () => {
    const s = startSession()
    expect(s.phase).toBe('playing')
    expect(s.isTicking).toBe(true)
    expect(logger.log).toHaveBeenCalledWith('Puzzle started: Easy (3×3)')
  })

  it('labels custom sizes', () => {
    startSession([[1, 2], [3, 0]])
    expect(logger.log).toHaveBeenCalledWith('Puzzle started: Custom (2×2)')
  })

  it('reports completion exactly once', () => {
    const onSolved = vi.fn()
    const s = startSession(ALMOST_SOLVED, { onSolved })

    clock.advance(3_000)
    expect(s.tap(2, 2)).toBe(true)

    expect(s.phase).toBe('won')
    expect(s.isTicking).toBe(false)
    expect(onSolved).toHaveBeenCalledTimes(1)
    expect(onSolved).toHaveBeenCalledWith({ moves: 1, elapsedMs: 3_000, difficulty: 'easy' })
    expect(logger.log).toHaveBeenLastCalledWith('Puzzle solved in 1 moves, 00:03')

    // Board is frozen once won
    expect(s.tap(2, 1)).toBe(false)
    expect(s.state.moves).toBe(1)
    expect(onSolved).toHaveBeenCalledTimes(1)
  })

  it('freezes the clock once won', () => {
    const s = startSession()
    clock.advance(2_000)
    s.tap(2, 2)
    clock.advance(10_000)
    expect(s.elapsedMs()).toBe(2_000)
  })

  it('does not report completion for rejected taps', () => {
    const onSolved = vi.fn()
    const s = startSession(ALMOST_SOLVED, { onSolved })
    expect(s.tap(0, 0)).toBe(false)
    expect(s.phase).toBe('playing')
    expect(onSolved).not.toHaveBeenCalled()
  })

  it('ticks once a second while playing', () => {
    const onTick = vi.fn()
    startSession(ALMOST_SOLVED, { onTick })

    clock.advance(1_000)
    vi.advanceTimersByTime(1_000)

    expect(onTick).toHaveBeenCalledTimes(1)
    const snapshot: SessionSnapshot = onTick.mock.calls[0][0]
    expect(snapshot.time).toBe('00:01')
    expect(snapshot.moves).toBe(0)
    expect(snapshot.phase).toBe('playing')
    expect(snapshot.movable).toEqual([
      { row: 1, col: 1 },
      { row: 2, col: 0 },
      { row: 2, col: 2 }
    ])
  })

  it('excludes paused time and ignores taps while paused', () => {
    const onTick = vi.fn()
    const s = startSession(ALMOST_SOLVED, { onTick })

    clock.advance(2_000)
    expect(s.pause()).toBe(true)
    expect(s.phase).toBe('paused')

    clock.advance(5_000)
    vi.advanceTimersByTime(5_000)
    expect(onTick).not.toHaveBeenCalled()
    expect(s.elapsedMs()).toBe(2_000)
    expect(s.tap(2, 2)).toBe(false)
    expect(s.snapshot().movable).toEqual([])

    expect(s.resume()).toBe(true)
    clock.advance(1_000)
    expect(s.elapsedMs()).toBe(3_000)
    expect(s.state.elapsedTime()).toBe(8_000)
  })

  it('hands out the puzzle for reading only', () => {
    const s = startSession()
    expectTypeOf(s.state).not.toHaveProperty('move')
    expectTypeOf(s.state).not.toHaveProperty('restart')
    expectTypeOf(s.state).not.toHaveProperty('changeDifficulty')

    const view = new BoardView()
    view.sync(s.state)
    expect(view.pick(new THREE.Raycaster(new THREE.Vector3(0, 0, 5), new THREE.Vector3(0, 0, -1)))).toEqual({ row: 1, col: 1 })
  })

  it('only pauses while playing and only resumes while paused', () => {
    const s = startSession()
    expect(s.resume()).toBe(false)
    s.tap(2, 2)
    expect(s.pause()).toBe(false)
  })

  it('restart returns to playing with a fresh clock', () => {
    const s = startSession()
    clock.advance(4_000)
    s.pause()

    s.restart()

    expect(s.phase).toBe('playing')
    expect(s.isTicking).toBe(true)
    expect(s.elapsedMs()).toBe(0)
    expect(s.state.moves).toBe(0)
  })

  it('cycles through the difficulties', () => {
    const s = startSession()
    expect(s.cycleDifficulty()).toBe('medium')
    expect(s.state.size).toBe(4)
    expect(s.snapshot().difficulty).toBe('medium')
  })

  it('starts from a difficulty', () => {
    session = GameSession.start('hard', { logger, clock, rng: createSeededRng(1) })
    expect(session.state.size).toBe(5)
    expect(session.snapshot().time).toBe('00:00')
  })
})

describe('nextDifficulty', () => {
  it('wraps after expert', () => {
    expect(nextDifficulty('easy')).toBe('medium')
    expect(nextDifficulty('hard')).toBe('expert')
    expect(nextDifficulty('expert')).toBe('easy')
  })
})
