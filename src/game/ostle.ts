/**
 * Ostle Game Engine
 *
 * A pure TypeScript implementation of the five-by-five push game.
 * Boards are flat, row-major arrays treated as immutable values: every
 * operation that changes the position returns a new board.
 */

// Board dimensions
export const BOARD_WIDTH = 5
export const BOARD_SIZE = BOARD_WIDTH * BOARD_WIDTH

export const HOLE_POSITION = { x: 2, y: 2 } as const
export const PLAYER1_ROW = 0
export const PLAYER2_ROW = BOARD_WIDTH - 1

/** A side reaches the win condition once the opponent is down to this many pieces. */
export const WIN_THRESHOLD = 3

// Cell values
export const EMPTY = 0
export const HOLE = 3

export type Player = 1 | 2
export type Cell = typeof EMPTY | Player | typeof HOLE

// Board is a flat array: board[y * BOARD_WIDTH + x]
// Row 0 is Player 1's home row, row 4 is Player 2's.
export type Board = readonly Cell[]

export type Direction = readonly [dx: -1 | 0 | 1, dy: -1 | 0 | 1]

/** Direction scan order used by move generation. */
export const DIRECTIONS: readonly Direction[] = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
]

export interface Move {
  x: number
  y: number
  dx: number
  dy: number
}

export class InvalidOperandError extends Error {
  constructor(readonly cell: Cell) {
    super(`Cell ${cell} has no opponent; only players do`)
    this.name = 'InvalidOperandError'
  }
}

export type OpponentResult =
  | { success: true; opponent: Player }
  | { success: false; error: InvalidOperandError }

// ============================================================================
// CELLS AND COORDINATES
// ============================================================================

export function isPlayer(cell: Cell): cell is Player {
  return cell === 1 || cell === 2
}

export function opponent(player: Player): Player {
  return player === 1 ? 2 : 1
}

/**
 * Total form of the opponent lookup for arbitrary cells.
 * Empty and Hole cells have no opponent and yield an InvalidOperandError.
 */
export function opponentOf(cell: Cell): OpponentResult {
  if (isPlayer(cell)) {
    return { success: true, opponent: opponent(cell) }
  }
  return { success: false, error: new InvalidOperandError(cell) }
}

export function xyToIndex(x: number, y: number): number {
  return y * BOARD_WIDTH + x
}

export function isInBoard(x: number, y: number): boolean {
  return x >= 0 && x < BOARD_WIDTH && y >= 0 && y < BOARD_WIDTH
}

export function cellAt(board: Board, x: number, y: number): Cell {
  return board[xyToIndex(x, y)]
}

// ============================================================================
// BOARDS
// ============================================================================

/**
 * Creates a board with every cell empty. Only useful for building
 * positions in tests and tools; a playable board always has one hole.
 */
export function createEmptyBoard(): Cell[] {
  return Array<Cell>(BOARD_SIZE).fill(EMPTY)
}

/**
 * Creates the starting position: Player 1 on row 0, Player 2 on row 4,
 * the hole in the center.
 */
export function createInitialBoard(): Board {
  const board = createEmptyBoard()
  for (let x = 0; x < BOARD_WIDTH; x++) {
    board[xyToIndex(x, PLAYER1_ROW)] = 1
    board[xyToIndex(x, PLAYER2_ROW)] = 2
  }
  board[xyToIndex(HOLE_POSITION.x, HOLE_POSITION.y)] = HOLE
  return board
}

/**
 * Builds a board from a sparse map of placements on top of an empty board.
 */
export function boardFromCells(
  cells: ReadonlyArray<readonly [x: number, y: number, cell: Cell]>
): Board {
  const board = createEmptyBoard()
  for (const [x, y, cell] of cells) {
    board[xyToIndex(x, y)] = cell
  }
  return board
}

export function boardsEqual(a: Board, b: Board | null | undefined): boolean {
  if (!b || a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

export function countCells(board: Board, cell: Cell): number {
  let count = 0
  for (const c of board) {
    if (c === cell) count++
  }
  return count
}

// ============================================================================
// MOVE GENERATION
// ============================================================================

/**
 * Returns every legal move for the player.
 *
 * The player's pieces may move in any in-bounds direction (whatever is in
 * the way gets pushed). The hole may be moved by either player, but only
 * into an empty neighbour. Repetition is not checked here.
 */
export function getLegalMoves(board: Board, player: Player): Move[] {
  const moves: Move[] = []

  for (let y = 0; y < BOARD_WIDTH; y++) {
    for (let x = 0; x < BOARD_WIDTH; x++) {
      const cell = board[xyToIndex(x, y)]
      if (cell !== player && cell !== HOLE) continue

      for (const [dx, dy] of DIRECTIONS) {
        const nx = x + dx
        const ny = y + dy
        if (!isInBoard(nx, ny)) continue
        if (cell === HOLE && board[xyToIndex(nx, ny)] !== EMPTY) continue
        moves.push({ x, y, dx, dy })
      }
    }
  }

  return moves
}

export function movesEqual(a: Move, b: Move): boolean {
  return a.x === b.x && a.y === b.y && a.dx === b.dx && a.dy === b.dy
}

/**
 * Validating membership check against the generated move list.
 * applyMove itself never validates.
 */
export function isLegalMove(board: Board, player: Player, move: Move): boolean {
  return getLegalMoves(board, player).some((legal) => movesEqual(legal, move))
}

// ============================================================================
// MOVE APPLICATION
// ============================================================================

/**
 * Applies a move, returning a new board. Does NOT mutate the original.
 *
 * The move must come from getLegalMoves for this exact board; nothing is
 * checked here. A moving piece pushes the contiguous line of pieces in
 * front of it one step. A piece pushed off the edge or into the hole is
 * removed, and the hole itself never moves as a result of a push.
 */
export function applyMove(board: Board, move: Move): Board {
  const next = [...board]
  const { dx, dy } = move

  if (next[xyToIndex(move.x, move.y)] === HOLE) {
    next[xyToIndex(move.x, move.y)] = EMPTY
    next[xyToIndex(move.x + dx, move.y + dy)] = HOLE
    return next
  }

  let x = move.x
  let y = move.y
  // What gets left behind in the cell the chain is leaving
  let carried: Cell = EMPTY

  for (;;) {
    const nx = x + dx
    const ny = y + dy
    const here = xyToIndex(x, y)

    if (!isInBoard(nx, ny) || next[xyToIndex(nx, ny)] === HOLE) {
      next[here] = carried
      break
    }

    const ahead = xyToIndex(nx, ny)
    if (next[ahead] === EMPTY) {
      next[ahead] = next[here]
      next[here] = carried
      break
    }

    const occupant = next[here]
    next[here] = carried
    carried = occupant
    x = nx
    y = ny
  }

  return next
}

// ============================================================================
// WIN DETECTION
// ============================================================================

/**
 * True once the player's opponent has lost at least two of its five pieces.
 */
export function isWinner(board: Board, player: Player): boolean {
  return countCells(board, opponent(player)) <= WIN_THRESHOLD
}

/**
 * Decides the winner after `mover` has played. A single push can leave
 * both sides at the threshold; the mover is checked first.
 */
export function resolveWinner(board: Board, mover: Player): Player | null {
  if (isWinner(board, mover)) return mover
  const other = opponent(mover)
  if (isWinner(board, other)) return other
  return null
}
