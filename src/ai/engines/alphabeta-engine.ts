/**
 * Alpha-Beta Engine
 *
 * Fixed-depth alpha-beta that only scores decided games. Quiet positions
 * all look equal, so the shuffled move order decides between them.
 */

import type { Board, Player } from '../../game/ostle'
import type { Rng } from '../../lib/rng'
import { type AlphaBetaConfig, alphaBetaConfigSchema } from '../../lib/schemas/engine'
import {
  type AgentOptions,
  type Clock,
  type MoveResult,
  type SearchAgent,
  systemClock,
} from '../ai-engine'
import { selectDepthLimited } from './search'

export class AlphaBetaEngine implements SearchAgent {
  readonly name = 'alphabeta'
  readonly description = 'Fixed-depth alpha-beta scoring only wins and losses'

  readonly config: AlphaBetaConfig
  private readonly rng: Rng
  private readonly clock: Clock

  constructor(options: AgentOptions = {}) {
    this.config = alphaBetaConfigSchema.parse(options.config ?? {})
    this.rng = options.rng ?? Math.random
    this.clock = options.clock ?? systemClock
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
        depth: this.config.depth,
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
