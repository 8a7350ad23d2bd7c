/**
 * Text notation for boards and moves, used by the CLI and by tests.
 *
 * Boards are five lines of five space-separated symbols:
 * `.` empty, `1` / `2` player pieces, `O` the hole.
 * Moves are written `(x,y,dx,dy)` and read back from `x y dx dy`.
 */

import {
  type Board,
  type Cell,
  type Move,
  BOARD_WIDTH,
  EMPTY,
  HOLE,
  DIRECTIONS,
  countCells,
  createEmptyBoard,
  xyToIndex,
} from './ostle'

export class NotationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'NotationError'
  }
}

const SYMBOLS: Record<Cell, string> = {
  [EMPTY]: '.',
  1: '1',
  2: '2',
  [HOLE]: 'O',
}

function parseSymbol(symbol: string, row: number, col: number): Cell {
  switch (symbol) {
    case '.':
      return EMPTY
    case '1':
      return 1
    case '2':
      return 2
    case 'O':
      return HOLE
    default:
      throw new NotationError(`Unknown symbol "${symbol}" at row ${row}, column ${col}`)
  }
}

export function formatBoard(board: Board): string {
  const lines: string[] = []
  for (let y = 0; y < BOARD_WIDTH; y++) {
    const row: string[] = []
    for (let x = 0; x < BOARD_WIDTH; x++) {
      row.push(SYMBOLS[board[xyToIndex(x, y)]])
    }
    lines.push(row.join(' '))
  }
  return lines.join('\n')
}

/**
 * Reads a board written by formatBoard. Blank lines and surrounding
 * whitespace are ignored.
 *
 * @throws NotationError on wrong dimensions, unknown symbols, or a hole
 *   count other than one
 */
export function parseBoard(text: string): Board {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

  if (lines.length !== BOARD_WIDTH) {
    throw new NotationError(`Expected ${BOARD_WIDTH} rows, got ${lines.length}`)
  }

  const board = createEmptyBoard()
  lines.forEach((line, y) => {
    const symbols = line.split(/\s+/)
    if (symbols.length !== BOARD_WIDTH) {
      throw new NotationError(`Row ${y} has ${symbols.length} cells, expected ${BOARD_WIDTH}`)
    }
    symbols.forEach((symbol, x) => {
      board[xyToIndex(x, y)] = parseSymbol(symbol, y, x)
    })
  })

  const holes = countCells(board, HOLE)
  if (holes !== 1) {
    throw new NotationError(`Expected exactly one hole, found ${holes}`)
  }

  return board
}

export function formatMove(move: Move): string {
  return `(${move.x},${move.y},${move.dx},${move.dy})`
}

export function formatMoves(moves: readonly Move[]): string {
  return moves.map(formatMove).join(', ')
}

/**
 * Reads `x y dx dy`. Only checks the shape; whether the move is legal on a
 * given board is up to isLegalMove.
 *
 * @throws NotationError on malformed text or a non-unit direction
 */
export function parseMove(text: string): Move {
  const parts = text.trim().split(/\s+/)
  if (parts.length !== 4 || !parts.every((p) => /^-?\d+$/.test(p))) {
    throw new NotationError(`Expected "x y dx dy", got "${text}"`)
  }

  const [x, y, dx, dy] = parts.map(Number)
  if (!DIRECTIONS.some(([ddx, ddy]) => ddx === dx && ddy === dy)) {
    throw new NotationError(`(${dx},${dy}) is not a direction`)
  }

  return { x, y, dx, dy }
}
