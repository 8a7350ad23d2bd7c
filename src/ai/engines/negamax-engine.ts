/**
 * Negamax Engine
 *
 * Alpha-beta negamax whose depth follows the remaining clock: shallower
 * when time is short, deeper when there is plenty.
 */

import type { Board, Player } from '../../game/ostle'
import type { Rng } from '../../lib/rng'
import { type NegamaxConfig, negamaxConfigSchema } from '../../lib/schemas/engine'
import {
  type AgentOptions,
  type Clock,
  type MoveResult,
  type SearchAgent,
  systemClock,
} from '../ai-engine'
import { depthForTime } from './engine-utils'
import { selectDepthLimited } from './search'

export class NegamaxEngine implements SearchAgent {
  readonly name = 'negamax'
  readonly description = 'Time-scaled negamax with material, mobility and center evaluation'

  readonly config: NegamaxConfig
  private readonly rng: Rng
  private readonly clock: Clock

  constructor(options: AgentOptions = {}) {
    this.config = negamaxConfigSchema.parse(options.config ?? {})
    this.rng = options.rng ?? Math.random
    this.clock = options.clock ?? systemClock
  }

  /** Search depth for a given remaining clock. */
  depthFor(timeBudgetMs: number): number {
    return depthForTime(timeBudgetMs, this.config.depthTable, this.config.maxDepth)
  }

  async calcBestMove(
    board: Board,
    prevBoard: Board | null,
    player: Player,
    timeBudgetMs: number
  ): Promise<MoveResult> {
    return selectDepthLimited(
      board,
      prevBoard,
      player,
      timeBudgetMs,
      {
        depth: this.depthFor(timeBudgetMs),
        weights: this.config.weights,
        ordering: this.config.ordering,
        immediateWin: false,
        safety: this.config.safety,
      },
      this.rng,
      this.clock
    )
  }
}
