/**
 * Iterative Deepening Engine
 *
 * Searches depth 1, 2, 3, ... within a per-move slice of the clock. Each
 * iteration tries the previous best move first, and the result of an
 * iteration the deadline cut short is thrown away.
 */

import type { Board, Player } from '../../game/ostle'
import type { Rng } from '../../lib/rng'
import { type IterativeConfig, iterativeConfigSchema } from '../../lib/schemas/engine'
import {
  type AgentOptions,
  type Clock,
  type MoveResult,
  type SearchAgent,
  requireLegalMoves,
  systemClock,
} from '../ai-engine'
import {
  Deadline,
  allocateMoveTime,
  findImmediateWin,
  isWinningScore,
} from './engine-utils'
import { type RootResult, type SearchStats, searchRoot } from './search'

export class IterativeEngine implements SearchAgent {
  readonly name = 'iterative'
  readonly description = 'Iterative deepening negamax with capture and best-move ordering'

  readonly config: IterativeConfig
  private readonly rng: Rng
  private readonly clock: Clock

  constructor(options: AgentOptions = {}) {
    this.config = iterativeConfigSchema.parse(options.config ?? {})
    this.rng = options.rng ?? Math.random
    this.clock = options.clock ?? systemClock
  }

  async calcBestMove(
    board: Board,
    prevBoard: Board | null,
    player: Player,
    timeBudgetMs: number
  ): Promise<MoveResult> {
    const startTime = this.clock()
    const legal = requireLegalMoves(board, player)
    const { weights } = this.config

    if (this.config.immediateWin) {
      const win = findImmediateWin(board, legal, player)
      if (win !== null) {
        return {
          move: win,
          score: weights.win,
          searchInfo: { depth: 0, nodesSearched: 0, timeUsed: this.clock() - startTime },
        }
      }
    }

    if (legal.length === 1) {
      return {
        move: legal[0],
        score: null,
        searchInfo: { depth: 0, nodesSearched: 0, timeUsed: this.clock() - startTime },
      }
    }

    const deadline = Deadline.after(this.clock, allocateMoveTime(timeBudgetMs, this.config.time))
    const stats: SearchStats = { nodes: 0 }
    let best: RootResult | null = null
    let depthReached = 0

    for (let depth = 1; depth <= this.config.maxDepth; depth++) {
      // Depth 1 always runs to completion so there is a searched move to play
      const result = searchRoot(
        board,
        prevBoard,
        player,
        depth,
        {
          weights,
          ordering: 'captures',
          rng: this.rng,
          deadline: depth === 1 ? Deadline.never() : deadline,
          stats,
        },
        best?.move ?? null
      )

      if (!result.complete) break

      if (result.move !== null) {
        best = result
        depthReached = depth
      }

      if (isWinningScore(result.score, weights) || deadline.expired()) break
    }

    return {
      move: best?.move ?? legal[0],
      score: best?.score ?? null,
      searchInfo: {
        depth: depthReached,
        nodesSearched: stats.nodes,
        timeUsed: this.clock() - startTime,
      },
    }
  }
}
