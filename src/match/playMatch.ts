/**
 * Straight-line match runner used by the benchmark: calls each agent in
 * turn, charges the measured time to its clock, and stops at the first
 * decisive event or at the ply cap.
 */

import {
  type Board,
  type Player,
  applyMove,
  createInitialBoard,
  isLegalMove,
  opponent,
  resolveWinner,
} from '../game/ostle'
import { formatMove } from '../game/notation'
import { type Clock, type MoveResult, NoLegalMovesError, systemClock } from '../ai/ai-engine'
import { logError } from '../lib/errorUtils'
import { type Rng, pickOne } from '../lib/rng'
import { type MatchOptionsInput, matchOptionsSchema } from '../lib/schemas/match'
import { type EndReason, type HistoryEntry, PLAYERS, type PlayerAgents } from './driver'

export interface MatchResult {
  /** Null for a draw */
  winner: Player | null
  reason: EndReason
  firstPlayer: Player
  plies: number
  /** Remaining time per player; negative for the side that ran out */
  clocks: Record<Player, number>
  history: HistoryEntry[]
  board: Board
}

export interface MatchDeps {
  /** Picks the first player when the options leave it open */
  rng?: Rng
  clock?: Clock
  onPly?: (entry: HistoryEntry, board: Board) => void
}

type Answer = { ok: true; result: MoveResult } | { ok: false; error: unknown }

export async function playMatch(
  agents: PlayerAgents,
  input: MatchOptionsInput = {},
  deps: MatchDeps = {}
): Promise<MatchResult> {
  const options = matchOptionsSchema.parse(input)
  const clock = deps.clock ?? systemClock
  const firstPlayer = options.firstPlayer ?? pickOne(PLAYERS, deps.rng ?? Math.random)

  const clocks: Record<Player, number> = { 1: options.timeLimitMs, 2: options.timeLimitMs }
  const history: HistoryEntry[] = []
  let board = createInitialBoard()
  let turn = firstPlayer

  const finish = (winner: Player | null, reason: EndReason): MatchResult => {
    if (options.verbose) {
      console.log(
        `[Match] Game finished after ${history.length} plies. ` +
          `Winner: ${winner === null ? 'none' : `Player ${winner}`}, reason: ${reason}`
      )
    }
    return { winner, reason, firstPlayer, plies: history.length, clocks, history, board }
  }

  while (history.length < options.maxPlies) {
    const prevBoard = history.length > 0 ? history[history.length - 1].board : null
    const startTime = clock()
    let answer: Answer
    try {
      const result = await agents[turn].calcBestMove(board, prevBoard, turn, clocks[turn])
      answer = { ok: true, result }
    } catch (error) {
      answer = { ok: false, error }
    }
    clocks[turn] -= clock() - startTime

    if (clocks[turn] < 0) return finish(opponent(turn), 'timeout')

    if (!answer.ok) {
      if (answer.error instanceof NoLegalMovesError) {
        return finish(opponent(turn), 'no_legal_moves')
      }
      logError('Match', answer.error)
      return finish(opponent(turn), 'agent_error')
    }

    const { move } = answer.result
    if (!isLegalMove(board, turn, move)) return finish(opponent(turn), 'illegal_move')

    const entry: HistoryEntry = { player: turn, board, move }
    history.push(entry)
    board = applyMove(board, move)
    deps.onPly?.(entry, board)
    if (options.verbose) {
      console.log(`[Match] Player ${turn} plays ${formatMove(move)}`)
    }

    const winner = resolveWinner(board, turn)
    if (winner !== null) return finish(winner, 'win_condition')

    turn = opponent(turn)
  }

  return finish(null, 'max_plies')
}
