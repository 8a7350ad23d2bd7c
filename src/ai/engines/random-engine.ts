/**
 * Random Engine
 *
 * Uniformly random legal move. Baseline opponent for benchmarks.
 */

import type { Board, Player } from '../../game/ostle'
import { type Rng, pickOne } from '../../lib/rng'
import {
  type AgentOptions,
  type Clock,
  type MoveResult,
  type SearchAgent,
  requireLegalMoves,
  systemClock,
} from '../ai-engine'

export class RandomEngine implements SearchAgent {
  readonly name = 'random'
  readonly description = 'Uniformly random legal move'

  private readonly rng: Rng
  private readonly clock: Clock

  constructor(options: AgentOptions = {}) {
    this.rng = options.rng ?? Math.random
    this.clock = options.clock ?? systemClock
  }

  async calcBestMove(
    board: Board,
    _prevBoard: Board | null,
    player: Player,
    _timeBudgetMs: number
  ): Promise<MoveResult> {
    const startTime = this.clock()
    const move = pickOne(requireLegalMoves(board, player), this.rng)
    return {
      move,
      score: null,
      searchInfo: { depth: 0, nodesSearched: 0, timeUsed: this.clock() - startTime },
    }
  }
}
