/**
 * Match Driver
 *
 * Tick-driven runner for one game between two agents. Each tick either asks
 * the side to move for a move, charges elapsed time to its clock and checks
 * whether the move has arrived, or does nothing once the game is over.
 * An agent's answer arrives through a promise into a single-slot mailbox;
 * the driver never waits on it and never cancels it.
 */

import {
  type Board,
  type Move,
  type Player,
  applyMove,
  createInitialBoard,
  isLegalMove,
  opponent,
  resolveWinner,
} from '../game/ostle'
import { formatMove } from '../game/notation'
import {
  type Clock,
  type MoveResult,
  NoLegalMovesError,
  type SearchAgent,
  systemClock,
} from '../ai/ai-engine'
import { logError } from '../lib/errorUtils'
import { type Rng, pickOne } from '../lib/rng'
import {
  type DriverOptions,
  type DriverOptionsInput,
  driverOptionsSchema,
} from '../lib/schemas/match'

export type DriverState = 'idle' | 'thinking' | 'finished'

export type EndReason =
  | 'win_condition'
  | 'timeout'
  | 'illegal_move'
  | 'no_legal_moves'
  | 'agent_error'
  | 'max_plies'

export const PLAYERS: readonly Player[] = [1, 2]

export interface HistoryEntry {
  player: Player
  /** Position the move was played from */
  board: Board
  move: Move
}

export type PlayerAgents = Record<Player, SearchAgent>

type Delivery = { kind: 'move'; result: MoveResult } | { kind: 'error'; error: unknown }

export class MatchDriver {
  readonly options: DriverOptions

  board: Board = createInitialBoard()
  turn: Player = 1
  clocks: Record<Player, number> = { 1: 0, 2: 0 }
  history: HistoryEntry[] = []
  state: DriverState = 'idle'
  /** Null until finished, and after a draw */
  winner: Player | null = null
  reason: EndReason | null = null

  private mailbox: Delivery | null = null
  // Deliveries from a request made before the last reset are dropped
  private requestId = 0

  constructor(
    private readonly agents: PlayerAgents,
    options: DriverOptionsInput = {},
    private readonly rng: Rng = Math.random
  ) {
    this.options = driverOptionsSchema.parse(options)
    this.reset()
  }

  /** Position one ply back, or null before the first move. */
  get prevBoard(): Board | null {
    const last = this.history[this.history.length - 1]
    return last ? last.board : null
  }

  get isFinished(): boolean {
    return this.state === 'finished'
  }

  reset(): void {
    this.board = createInitialBoard()
    this.turn = pickOne(PLAYERS, this.rng)
    this.clocks = { 1: this.options.timeLimitMs, 2: this.options.timeLimitMs }
    this.history = []
    this.state = 'idle'
    this.winner = null
    this.reason = null
    this.mailbox = null
    this.requestId++
  }

  tick(dtMs: number): void {
    switch (this.state) {
      case 'idle':
        this.state = 'thinking'
        this.requestMove()
        return

      case 'thinking': {
        this.clocks[this.turn] -= dtMs
        if (this.clocks[this.turn] <= 0) {
          this.finish(opponent(this.turn), 'timeout')
          return
        }

        const delivery = this.mailbox
        if (delivery === null) return
        this.mailbox = null

        if (delivery.kind === 'error') {
          this.handleAgentError(delivery.error)
          return
        }
        this.playMove(delivery.result.move)
        return
      }

      case 'finished':
        return
    }
  }

  private requestMove(): void {
    const request = ++this.requestId
    const agent = this.agents[this.turn]
    const board = this.board
    const prevBoard = this.prevBoard
    const player = this.turn
    const budget = this.clocks[player]

    void Promise.resolve()
      .then(() => agent.calcBestMove(board, prevBoard, player, budget))
      .then(
        (result) => this.deliver(request, { kind: 'move', result }),
        (error: unknown) => this.deliver(request, { kind: 'error', error })
      )
  }

  private deliver(request: number, delivery: Delivery): void {
    if (request !== this.requestId) return
    this.mailbox = delivery
  }

  private handleAgentError(error: unknown): void {
    if (error instanceof NoLegalMovesError) {
      this.finish(opponent(this.turn), 'no_legal_moves')
      return
    }
    logError('Match', error)
    this.finish(opponent(this.turn), 'agent_error')
  }

  private playMove(move: Move): void {
    const mover = this.turn
    if (!isLegalMove(this.board, mover, move)) {
      this.finish(opponent(mover), 'illegal_move')
      return
    }

    this.history.push({ player: mover, board: this.board, move })
    this.board = applyMove(this.board, move)
    this.log(`Player ${mover} plays ${formatMove(move)}`)

    const winner = resolveWinner(this.board, mover)
    if (winner !== null) {
      this.finish(winner, 'win_condition')
      return
    }

    if (this.options.maxPlies !== undefined && this.history.length >= this.options.maxPlies) {
      this.finish(null, 'max_plies')
      return
    }

    this.turn = opponent(mover)
    this.state = 'idle'
  }

  private finish(winner: Player | null, reason: EndReason): void {
    this.state = 'finished'
    this.winner = winner
    this.reason = reason
    this.log(
      `Game finished. Winner: ${winner === null ? 'none' : `Player ${winner}`}, reason: ${reason}`
    )
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[Match] ${message}`)
    }
  }
}

/**
 * Drives a MatchDriver off a real clock until the game ends, yielding to
 * the event loop between ticks so agent promises can settle.
 *
 * @param onPly - Called after every move with the new history entry
 */
export async function runDriver(
  driver: MatchDriver,
  clock: Clock = systemClock,
  onPly?: (entry: HistoryEntry, board: Board) => void
): Promise<void> {
  let last = clock()
  let seen = driver.history.length

  while (!driver.isFinished) {
    await new Promise<void>((resolve) => setImmediate(resolve))
    const now = clock()
    driver.tick(now - last)
    last = now

    while (seen < driver.history.length) {
      const entry = driver.history[seen]
      seen++
      onPly?.(entry, seen < driver.history.length ? driver.history[seen].board : driver.board)
    }
  }
}
