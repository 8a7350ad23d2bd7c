/**
 * Stand-in agents for match tests.
 */

import { type Board, type Move, type Player, HOLE, cellAt, getLegalMoves } from '../game/ostle'
import type { MoveResult, SearchAgent } from '../ai/ai-engine'

export interface AgentCall {
  board: Board
  prevBoard: Board | null
  player: Player
  timeBudgetMs: number
}

function answer(move: Move): MoveResult {
  return { move, score: null, searchInfo: { depth: 0, nodesSearched: 0, timeUsed: 0 } }
}

/**
 * Plays the given moves in order, records every call, and fails once the
 * script runs out.
 */
export class ScriptedAgent implements SearchAgent {
  readonly name = 'scripted'
  readonly description = 'Plays a fixed list of moves'
  readonly calls: AgentCall[] = []
  private next = 0

  constructor(private readonly moves: readonly Move[]) {}

  async calcBestMove(
    board: Board,
    prevBoard: Board | null,
    player: Player,
    timeBudgetMs: number
  ): Promise<MoveResult> {
    this.calls.push({ board, prevBoard, player, timeBudgetMs })
    if (this.next >= this.moves.length) {
      throw new Error('script exhausted')
    }
    return answer(this.moves[this.next++])
  }
}

/** Always moves the hole, in generation order, so no piece ever changes. */
export class HoleShuttleAgent implements SearchAgent {
  readonly name = 'hole-shuttle'
  readonly description = 'Moves only the hole'

  async calcBestMove(board: Board, _prevBoard: Board | null, player: Player): Promise<MoveResult> {
    const move = getLegalMoves(board, player).find((m) => cellAt(board, m.x, m.y) === HOLE)
    if (move === undefined) throw new Error('hole cannot move')
    return answer(move)
  }
}

export class FailingAgent implements SearchAgent {
  readonly name = 'failing'
  readonly description = 'Rejects every request'

  constructor(private readonly error: unknown) {}

  async calcBestMove(): Promise<MoveResult> {
    throw this.error
  }
}

/** Never answers. */
export class StalledAgent implements SearchAgent {
  readonly name = 'stalled'
  readonly description = 'Never answers'

  calcBestMove(): Promise<MoveResult> {
    return new Promise<MoveResult>(() => {})
  }
}

/** Lets pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve))
}
