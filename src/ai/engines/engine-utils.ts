/**
 * Shared Engine Utilities
 *
 * Evaluation, move ordering, deadlines and depth selection used by every
 * search agent.
 */

import {
  type Board,
  type Move,
  type Player,
  EMPTY,
  HOLE,
  applyMove,
  cellAt,
  countCells,
  getLegalMoves,
  isInBoard,
  isWinner,
  movesEqual,
  opponent,
} from '../../game/ostle'
import { type Rng, shuffle } from '../../lib/rng'
import type {
  DepthStep,
  EvalWeights,
  MoveOrdering,
  TimeAllocation,
} from '../../lib/schemas/engine'
import type { Clock } from '../ai-engine'

export {
  DEFAULT_EVAL_WEIGHTS,
  MATERIAL_WEIGHTS,
  OUTCOME_ONLY_WEIGHTS,
} from '../../lib/schemas/engine'

// ============================================================================
// POSITION EVALUATION
// ============================================================================

/** The hole's start cell and its four neighbours. */
export const CENTER_CELLS: ReadonlyArray<readonly [x: number, y: number]> = [
  [1, 2],
  [2, 1],
  [2, 2],
  [2, 3],
  [3, 2],
]

function centerCount(board: Board, player: Player): number {
  let count = 0
  for (const [x, y] of CENTER_CELLS) {
    if (cellAt(board, x, y) === player) count++
  }
  return count
}

/**
 * Static score of a non-terminal position from `player`'s point of view.
 * Mobility needs two move generations, so it is skipped when its weight is 0.
 */
export function evaluatePosition(board: Board, player: Player, weights: EvalWeights): number {
  const other = opponent(player)
  let score = 0

  if (weights.piece !== 0) {
    score += weights.piece * (countCells(board, player) - countCells(board, other))
  }
  if (weights.mobility !== 0) {
    score +=
      weights.mobility *
      (getLegalMoves(board, player).length - getLegalMoves(board, other).length)
  }
  if (weights.center !== 0) {
    score += weights.center * (centerCount(board, player) - centerCount(board, other))
  }

  return score
}

/**
 * Score of a decided position, or null if nobody has won yet.
 * Remaining depth is added so nearer wins (and later losses) are preferred.
 */
export function terminalScore(
  board: Board,
  player: Player,
  depth: number,
  weights: EvalWeights
): number | null {
  if (isWinner(board, player)) return weights.win + depth
  if (isWinner(board, opponent(player))) return -(weights.loss + depth)
  return null
}

export function isWinningScore(score: number, weights: EvalWeights): boolean {
  return Math.abs(score) >= Math.min(weights.win, weights.loss)
}

// ============================================================================
// MOVE ORDERING
// ============================================================================

/**
 * What a move does to the opponent: nothing, moves one of its pieces, or
 * knocks one off the board (over the edge or into the hole).
 */
export type PushKind = 'quiet' | 'push' | 'capture'

const PUSH_RANK: Record<PushKind, number> = { quiet: 0, push: 1, capture: 2 }

/**
 * Classifies a move by what it does to the opponent, without applying it.
 */
export function classifyMove(board: Board, move: Move, player: Player): PushKind {
  if (cellAt(board, move.x, move.y) === HOLE) return 'quiet'

  const other = opponent(player)
  let x = move.x
  let y = move.y
  let touchesOpponent = false

  for (;;) {
    const nx = x + move.dx
    const ny = y + move.dy
    if (!isInBoard(nx, ny) || cellAt(board, nx, ny) === HOLE) {
      return cellAt(board, x, y) === other ? 'capture' : kindOf(touchesOpponent)
    }
    const ahead = cellAt(board, nx, ny)
    if (ahead === EMPTY) return kindOf(touchesOpponent)
    if (ahead === other) touchesOpponent = true
    x = nx
    y = ny
  }
}

function kindOf(touchesOpponent: boolean): PushKind {
  return touchesOpponent ? 'push' : 'quiet'
}

/**
 * Returns the moves in search order. Sorting is stable, and a `preferred`
 * move (the previous iteration's best) always goes first.
 */
export function orderMoves(
  board: Board,
  moves: readonly Move[],
  player: Player,
  ordering: MoveOrdering,
  rng: Rng,
  preferred: Move | null = null
): Move[] {
  let ordered: Move[]
  switch (ordering) {
    case 'none':
      ordered = [...moves]
      break
    case 'shuffle':
      ordered = shuffle(moves, rng)
      break
    case 'captures': {
      const ranks = new Map<Move, number>()
      for (const move of moves) ranks.set(move, PUSH_RANK[classifyMove(board, move, player)])
      ordered = [...moves].sort((a, b) => (ranks.get(b) ?? 0) - (ranks.get(a) ?? 0))
      break
    }
  }

  if (preferred !== null) {
    const idx = ordered.findIndex((m) => movesEqual(m, preferred))
    if (idx > 0) {
      const [pv] = ordered.splice(idx, 1)
      ordered.unshift(pv)
    }
  }

  return ordered
}

/**
 * One-ply scan for a move that wins on the spot.
 */
export function findImmediateWin(board: Board, moves: readonly Move[], player: Player): Move | null {
  for (const move of moves) {
    if (isWinner(applyMove(board, move), player)) return move
  }
  return null
}

// ============================================================================
// TIME MANAGEMENT
// ============================================================================

/**
 * Search deadline. Once expired it stays expired, so every node of an
 * unwinding search sees the same answer.
 */
export class Deadline {
  private passed = false

  constructor(
    private readonly clock: Clock,
    readonly at: number
  ) {}

  static after(clock: Clock, ms: number): Deadline {
    return new Deadline(clock, clock() + ms)
  }

  static never(): Deadline {
    return new Deadline(() => 0, Infinity)
  }

  expired(): boolean {
    if (!this.passed && this.clock() >= this.at) {
      this.passed = true
    }
    return this.passed
  }

  /** Whether an earlier `expired()` call saw the deadline pass. Does not read the clock. */
  get seenExpired(): boolean {
    return this.passed
  }
}

/**
 * Per-move slice of the remaining clock for iterative deepening.
 */
export function allocateMoveTime(remainingMs: number, time: TimeAllocation): number {
  if (remainingMs <= 0) return 0
  const slice = Math.min(Math.max(remainingMs / time.movesToGo, time.minMs), time.maxMs)
  return Math.min(slice, remainingMs) * time.safety
}

/**
 * Picks the depth of the first table step whose threshold the remaining
 * clock is below, or `maxDepth` when there is time to spare.
 */
export function depthForTime(
  remainingMs: number,
  table: readonly DepthStep[],
  maxDepth: number
): number {
  const steps = [...table].sort((a, b) => a.below - b.below)
  for (const step of steps) {
    if (remainingMs < step.below) return step.depth
  }
  return maxDepth
}
