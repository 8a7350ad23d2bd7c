import { describe, it, expect } from 'vitest'
import { applyMove, boardsEqual, createInitialBoard } from './ostle'
import {
  NotationError,
  formatBoard,
  formatMove,
  formatMoves,
  parseBoard,
  parseMove,
} from './notation'

const INITIAL = ['1 1 1 1 1', '. . . . .', '. . O . .', '. . . . .', '2 2 2 2 2'].join('\n')

describe('formatBoard', () => {
  it('writes the starting position', () => {
    expect(formatBoard(createInitialBoard())).toBe(INITIAL)
  })

  it('shows moved pieces', () => {
    const board = applyMove(createInitialBoard(), { x: 0, y: 0, dx: 0, dy: 1 })
    expect(formatBoard(board).split('\n').slice(0, 2)).toEqual(['. 1 1 1 1', '1 . . . .'])
  })
})

describe('parseBoard', () => {
  it('reads what formatBoard writes', () => {
    expect(boardsEqual(parseBoard(INITIAL), createInitialBoard())).toBe(true)
  })

  it('ignores blank lines and indentation', () => {
    const text = `\n  ${INITIAL.split('\n').join('\n  ')}\n\n`
    expect(boardsEqual(parseBoard(text), createInitialBoard())).toBe(true)
  })

  it('rejects the wrong number of rows', () => {
    expect(() => parseBoard('1 1 1 1 1')).toThrow('Expected 5 rows, got 1')
  })

  it('rejects short rows', () => {
    const text = INITIAL.replace('2 2 2 2 2', '2 2 2 2')
    expect(() => parseBoard(text)).toThrow('Row 4 has 4 cells, expected 5')
  })

  it('rejects unknown symbols', () => {
    const text = INITIAL.replace('1 1 1 1 1', '1 1 X 1 1')
    expect(() => parseBoard(text)).toThrow('Unknown symbol "X" at row 0, column 2')
  })

  it('requires exactly one hole', () => {
    const noHole = INITIAL.replace('O', '.')
    expect(() => parseBoard(noHole)).toThrow('Expected exactly one hole, found 0')

    const twoHoles = INITIAL.replace('. . . . .', 'O . . . .')
    expect(() => parseBoard(twoHoles)).toThrow(NotationError)
  })
})

describe('move notation', () => {
  it('formats a move as a tuple', () => {
    expect(formatMove({ x: 2, y: 2, dx: 0, dy: -1 })).toBe('(2,2,0,-1)')
  })

  it('joins move lists', () => {
    expect(
      formatMoves([
        { x: 0, y: 0, dx: 1, dy: 0 },
        { x: 4, y: 4, dx: -1, dy: 0 },
      ])
    ).toBe('(0,0,1,0), (4,4,-1,0)')
  })

  it('parses space-separated integers', () => {
    expect(parseMove(' 3 4 0 -1 ')).toEqual({ x: 3, y: 4, dx: 0, dy: -1 })
  })

  it('rejects malformed text', () => {
    expect(() => parseMove('3 4 0')).toThrow(NotationError)
    expect(() => parseMove('a b c d')).toThrow('Expected "x y dx dy", got "a b c d"')
  })

  it('rejects diagonal and long steps', () => {
    expect(() => parseMove('0 0 1 1')).toThrow('(1,1) is not a direction')
    expect(() => parseMove('0 0 2 0')).toThrow(NotationError)
  })
})
