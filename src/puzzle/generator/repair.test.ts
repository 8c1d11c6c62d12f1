import { describe, it, expect, vi, afterEach } from 'vitest'
import { generateBoard } from './index'
import { checkSolvability, countInversions, flattenTiles } from '../analysis/Solvability'
import { BLANK } from '../types'
import { createSeededRng } from '../utils/Random'

vi.mock('../analysis/Solvability', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../analysis/Solvability')>()
  return { ...actual, checkSolvability: vi.fn(actual.checkSolvability) }
})

describe('generateBoard parity repair', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('swaps the first two tiles when the shuffled board fails the parity check', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const baseline = generateBoard(4, createSeededRng(11))
    expect(baseline.repaired).toBe(false)

    // First two non-blank cells of the baseline, row-major
    const cells: Array<{ row: number; col: number }> = []
    baseline.board.forEach((row, r) => row.forEach((value, c) => {
      if (value !== BLANK && cells.length < 2) cells.push({ row: r, col: c })
    }))
    const [a, b] = cells
    const expected = baseline.board.map(row => [...row])
    expected[a.row][a.col] = baseline.board[b.row][b.col]
    expected[b.row][b.col] = baseline.board[a.row][a.col]

    vi.mocked(checkSolvability).mockReturnValueOnce(false)
    const result = generateBoard(4, createSeededRng(11))

    expect(result.repaired).toBe(true)
    expect(result.board).toEqual(expected)
    expect(result.blank).toEqual(baseline.blank)
    expect(result.board[result.blank.row][result.blank.col]).toBe(BLANK)

    const inversions = countInversions(flattenTiles(baseline.board))
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith(
      `generateBoard: 4x4 shuffle failed parity check (${inversions} inversions), repaired`
    )
  })
})
