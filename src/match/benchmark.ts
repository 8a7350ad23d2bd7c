/**
 * Benchmark: plays a series of matches between two agents and tallies the
 * outcomes. Game i starts with Player 1 when i is even, Player 2 otherwise.
 */

import type { Player } from '../game/ostle'
import type { Clock } from '../ai/ai-engine'
import { type BenchmarkOptionsInput, benchmarkOptionsSchema } from '../lib/schemas/match'
import type { EndReason, PlayerAgents } from './driver'
import { type MatchResult, playMatch } from './playMatch'

export interface MatchSummary {
  firstPlayer: Player
  winner: Player | null
  reason: EndReason
  plies: number
}

export interface BenchmarkResult {
  games: number
  player1Wins: number
  player2Wins: number
  draws: number
  reasons: Record<EndReason, number>
  matches: MatchSummary[]
}

export interface BenchmarkDeps {
  clock?: Clock
  onProgress?: (completed: number, total: number, match: MatchResult) => void
}

export async function runBenchmark(
  agents: PlayerAgents,
  input: BenchmarkOptionsInput = {},
  deps: BenchmarkDeps = {}
): Promise<BenchmarkResult> {
  const options = benchmarkOptionsSchema.parse(input)
  const result: BenchmarkResult = {
    games: options.games,
    player1Wins: 0,
    player2Wins: 0,
    draws: 0,
    reasons: {
      win_condition: 0,
      timeout: 0,
      illegal_move: 0,
      no_legal_moves: 0,
      agent_error: 0,
      max_plies: 0,
    },
    matches: [],
  }

  for (let i = 0; i < options.games; i++) {
    const match = await playMatch(
      agents,
      {
        timeLimitMs: options.timeLimitMs,
        maxPlies: options.maxPlies,
        verbose: options.verbose,
        firstPlayer: i % 2 === 0 ? 1 : 2,
      },
      { clock: deps.clock }
    )

    if (match.winner === 1) result.player1Wins++
    else if (match.winner === 2) result.player2Wins++
    else result.draws++
    result.reasons[match.reason]++
    result.matches.push({
      firstPlayer: match.firstPlayer,
      winner: match.winner,
      reason: match.reason,
      plies: match.plies,
    })

    deps.onProgress?.(i + 1, options.games, match)
  }

  return result
}
