/**
 * Capture-First Engine
 *
 * Shallow material search that looks at knock-offs before anything else
 * and plays an outright win without searching.
 */

import type { Board, Player } from '../../game/ostle'
import type { Rng } from '../../lib/rng'
import { type CaptureFirstConfig, captureFirstConfigSchema } from '../../lib/schemas/engine'
import {
  type AgentOptions,
  type Clock,
  type MoveResult,
  type SearchAgent,
  systemClock,
} from '../ai-engine'
import { depthForTime } from './engine-utils'
import { selectDepthLimited } from './search'

export class CaptureFirstEngine implements SearchAgent {
  readonly name = 'capture-first'
  readonly description = 'Material search that tries knock-offs first'

  readonly config: CaptureFirstConfig
  private readonly rng: Rng
  private readonly clock: Clock

  constructor(options: AgentOptions = {}) {
    this.config = captureFirstConfigSchema.parse(options.config ?? {})
    this.rng = options.rng ?? Math.random
    this.clock = options.clock ?? systemClock
  }

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
        ordering: 'captures',
        immediateWin: this.config.immediateWin,
        safety: this.config.safety,
      },
      this.rng,
      this.clock
    )
  }
}
