/**
 * Search Agent Abstraction Layer
 *
 * Every strategy implements the same `SearchAgent` interface so the match
 * driver and the benchmark can swap them without knowing which one they
 * hold. Agents are stateless between calls: everything they know about the
 * game comes in through the arguments.
 */

import { type Board, type Move, type Player, getLegalMoves } from '../game/ostle'
import type { Rng } from '../lib/rng'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Deepest fully searched depth (0 when no search ran) */
  depth: number
  /** Number of positions visited */
  nodesSearched: number
  /** Wall-clock time spent choosing the move (ms) */
  timeUsed: number
}

/**
 * Result returned from move selection.
 */
export interface MoveResult {
  move: Move
  /** Score from the mover's perspective, if the agent computes one */
  score: number | null
  searchInfo: SearchInfo
}

/** Monotonic millisecond clock. */
export type Clock = () => number

export const systemClock: Clock = () => performance.now()

export interface SearchAgent {
  /** Unique agent identifier */
  readonly name: string

  /** Human-readable description */
  readonly description: string

  /**
   * Choose a move for `player`.
   *
   * @param prevBoard - Position one ply earlier, used to avoid an immediate
   *   repetition; null at the start of a game
   * @param timeBudgetMs - The player's whole remaining clock
   * @throws NoLegalMovesError when the player cannot move
   */
  calcBestMove(
    board: Board,
    prevBoard: Board | null,
    player: Player,
    timeBudgetMs: number
  ): Promise<MoveResult>
}

/**
 * Dependencies handed to agent constructors.
 */
export interface AgentOptions {
  rng?: Rng
  clock?: Clock
  /** Strategy-specific settings, validated by each agent's schema */
  config?: Record<string, unknown>
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Raised when the side to move has no legal move. Match runners score this
 * as a loss for that side.
 */
export class NoLegalMovesError extends Error {
  constructor(readonly player: Player) {
    super(`Player ${player} has no legal moves`)
    this.name = 'NoLegalMovesError'
  }
}

/**
 * Returns the legal moves or throws NoLegalMovesError.
 */
export function requireLegalMoves(board: Board, player: Player): Move[] {
  const moves = getLegalMoves(board, player)
  if (moves.length === 0) {
    throw new NoLegalMovesError(player)
  }
  return moves
}

// ============================================================================
// AGENT REGISTRY
// ============================================================================

export type AgentFactory = (options: AgentOptions) => SearchAgent

interface AgentEntry {
  description: string
  factory: AgentFactory
}

/**
 * Name → constructor mapping used by the CLI and the benchmark.
 */
export class AgentRegistry {
  private agents: Map<string, AgentEntry> = new Map()
  private defaultAgentName: string | null = null

  /**
   * Register an agent constructor. The first registration becomes the default.
   */
  register(name: string, description: string, factory: AgentFactory): void {
    this.agents.set(name, { description, factory })

    if (this.defaultAgentName === null) {
      this.defaultAgentName = name
    }
  }

  unregister(name: string): void {
    this.agents.delete(name)

    if (this.defaultAgentName === name) {
      const first = this.agents.keys().next()
      this.defaultAgentName = first.done ? null : first.value
    }
  }

  /**
   * Construct a fresh agent by name.
   *
   * @throws Error if the name is not registered
   */
  create(name: string, options: AgentOptions = {}): SearchAgent {
    const entry = this.agents.get(name)
    if (!entry) {
      throw new Error(`Agent "${name}" not registered (known: ${this.names().join(', ')})`)
    }
    return entry.factory(options)
  }

  /**
   * @throws Error if the name is not registered
   */
  setDefault(name: string): void {
    if (!this.agents.has(name)) {
      throw new Error(`Agent "${name}" not registered`)
    }
    this.defaultAgentName = name
  }

  getDefaultName(): string | null {
    return this.defaultAgentName
  }

  has(name: string): boolean {
    return this.agents.has(name)
  }

  names(): string[] {
    return Array.from(this.agents.keys())
  }

  list(): Array<{ name: string; description: string }> {
    return Array.from(this.agents.entries()).map(([name, entry]) => ({
      name,
      description: entry.description,
    }))
  }
}

// Global agent registry instance
export const agentRegistry = new AgentRegistry()
