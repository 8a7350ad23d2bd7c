/**
 * Negamax Search
 *
 * Alpha-beta negamax shared by every search agent. The window is threaded
 * through the recursion as plain arguments and each call returns its own
 * (score, move) pair; no bounds live outside the call stack.
 */

import {
  type Board,
  type Move,
  type Player,
  applyMove,
  boardsEqual,
  getLegalMoves,
  opponent,
} from '../../game/ostle'
import type { Rng } from '../../lib/rng'
import type { EvalWeights, MoveOrdering } from '../../lib/schemas/engine'
import { type Clock, type MoveResult, requireLegalMoves } from '../ai-engine'
import {
  Deadline,
  evaluatePosition,
  findImmediateWin,
  orderMoves,
  terminalScore,
} from './engine-utils'

export interface SearchStats {
  nodes: number
}

export interface SearchContext {
  weights: EvalWeights
  ordering: MoveOrdering
  rng: Rng
  deadline: Deadline
  stats: SearchStats
}

export interface SearchResult {
  /** Score from the perspective of the side to move at this node */
  score: number
  /** Best move found, or null at leaves and when every child was skipped */
  move: Move | null
}

export interface RootResult extends SearchResult {
  /** False when the deadline cut the search short */
  complete: boolean
}

/** Nodes visited between two reads of the clock. */
export const DEADLINE_CHECK_INTERVAL = 64

function outOfTime(ctx: SearchContext): boolean {
  return (ctx.stats.nodes - 1) % DEADLINE_CHECK_INTERVAL === 0
    ? ctx.deadline.expired()
    : ctx.deadline.seenExpired
}

/**
 * Searches `board` with `player` to move.
 *
 * @param prevBoard - Position one ply earlier; a child equal to it is skipped
 * @param preferred - Move to try first at this node only
 */
export function negamax(
  board: Board,
  prevBoard: Board | null,
  player: Player,
  depth: number,
  alpha: number,
  beta: number,
  ctx: SearchContext,
  preferred: Move | null = null
): SearchResult {
  ctx.stats.nodes++

  const terminal = terminalScore(board, player, depth, ctx.weights)
  if (terminal !== null) {
    return { score: terminal, move: null }
  }

  // Out of time or out of depth: fall back to the static score
  const timeUp = outOfTime(ctx)
  if (timeUp || depth <= 0) {
    return { score: evaluatePosition(board, player, ctx.weights), move: null }
  }

  const legal = getLegalMoves(board, player)
  if (legal.length === 0) {
    return { score: -(ctx.weights.loss + depth), move: null }
  }

  const moves = orderMoves(board, legal, player, ctx.ordering, ctx.rng, preferred)
  const next = opponent(player)
  let best: SearchResult | null = null
  let a = alpha

  for (const move of moves) {
    const child = applyMove(board, move)
    if (boardsEqual(child, prevBoard)) continue

    const reply = negamax(child, board, next, depth - 1, -beta, -a, ctx)
    const score = -reply.score

    if (best === null || score > best.score) {
      best = { score, move }
    }
    if (score > a) a = score
    if (a >= beta || ctx.deadline.seenExpired) break
  }

  return best ?? { score: evaluatePosition(board, player, ctx.weights), move: null }
}

/**
 * Runs one full-window search from the root. The search is complete unless
 * some node saw the deadline pass.
 */
export function searchRoot(
  board: Board,
  prevBoard: Board | null,
  player: Player,
  depth: number,
  ctx: SearchContext,
  preferred: Move | null = null
): RootResult {
  const result = negamax(board, prevBoard, player, depth, -Infinity, Infinity, ctx, preferred)
  return { ...result, complete: !ctx.deadline.seenExpired }
}

// ============================================================================
// DEPTH-LIMITED MOVE SELECTION
// ============================================================================

export interface DepthLimitedOptions {
  depth: number
  weights: EvalWeights
  ordering: MoveOrdering
  immediateWin: boolean
  /** Fraction of the remaining clock the search may use before unwinding */
  safety: number
}

/**
 * One search to a fixed depth under a hard deadline. Used by the agents
 * whose depth is decided before the search starts.
 */
export function selectDepthLimited(
  board: Board,
  prevBoard: Board | null,
  player: Player,
  timeBudgetMs: number,
  options: DepthLimitedOptions,
  rng: Rng,
  clock: Clock
): MoveResult {
  const startTime = clock()
  const legal = requireLegalMoves(board, player)

  if (options.immediateWin) {
    const win = findImmediateWin(board, legal, player)
    if (win !== null) {
      return {
        move: win,
        score: options.weights.win,
        searchInfo: { depth: 0, nodesSearched: 0, timeUsed: clock() - startTime },
      }
    }
  }

  if (legal.length === 1) {
    return {
      move: legal[0],
      score: null,
      searchInfo: { depth: 0, nodesSearched: 0, timeUsed: clock() - startTime },
    }
  }

  const deadline = Deadline.after(clock, Math.max(0, timeBudgetMs) * options.safety)
  const ctx: SearchContext = {
    weights: options.weights,
    ordering: options.ordering,
    rng,
    deadline,
    stats: { nodes: 0 },
  }
  const result = searchRoot(board, prevBoard, player, options.depth, ctx)

  return {
    // Every move repeating the previous position leaves the root without a move
    move: result.move ?? legal[0],
    score: result.move !== null ? result.score : null,
    searchInfo: {
      depth: result.complete ? options.depth : 0,
      nodesSearched: ctx.stats.nodes,
      timeUsed: clock() - startTime,
    },
  }
}
