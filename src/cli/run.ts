/**
 * ostle-bench command line
 *
 *   bench   play a series of games between two agents and tally the results
 *   play    play one game and print the board after every move
 *   agents  list the registered agents
 */

import minimist from 'minimist'
import type { Player } from '../game/ostle'
import { formatBoard, formatMove } from '../game/notation'
import { type AgentOptions, type Clock, systemClock } from '../ai/ai-engine'
import { agentRegistry } from '../ai/engines'
import { MatchDriver, type PlayerAgents, runDriver } from '../match/driver'
import { runBenchmark } from '../match/benchmark'
import { getErrorMessage } from '../lib/errorUtils'
import { mulberry32 } from '../lib/rng'
import { type CliArgs, cliArgsSchema } from '../lib/schemas/match'
import { formatDurationMs, formatTimeMs } from '../lib/timeFormatting'

export interface CliOutput {
  log: (line: string) => void
  error: (line: string) => void
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
}

export const USAGE = `Usage: ostle-bench <command> [options]

Commands:
  bench    Play a series of games between two agents
  play     Play one game and print every position
  agents   List the available agents

Options:
  --agent1 <name>      Agent playing Player 1 (default: iterative)
  --agent2 <name>      Agent playing Player 2 (default: negamax)
  --games <n>          Number of games for bench (default: 10)
  --time-limit <ms>    Clock per player per game (default: 5000)
  --max-plies <n>      Ply cap before a game is drawn (default: 200)
  --seed <n>           Seed for agent and first-player randomness (default: 1)
  --json               Print bench results as JSON
  --verbose            Log every move`

function parseArgs(argv: string[]): { command: string | undefined; args: CliArgs } {
  const parsed = minimist(argv, { boolean: ['json', 'verbose'] })
  const { _: positional, ...rest } = parsed
  const command = positional.length > 0 ? String(positional[0]) : undefined
  return { command, args: cliArgsSchema.parse(rest) }
}

function createAgents(args: CliArgs, clock: Clock): PlayerAgents {
  const options = (seedOffset: number): AgentOptions => ({
    rng: mulberry32(args.seed + seedOffset),
    clock,
  })
  return {
    1: agentRegistry.create(args.agent1, options(1)),
    2: agentRegistry.create(args.agent2, options(2)),
  }
}

function winnerLabel(winner: Player | null): string {
  return winner === null ? 'Draw' : `Player ${winner} wins`
}

async function benchCommand(args: CliArgs, out: CliOutput, clock: Clock): Promise<void> {
  const agents = createAgents(args, clock)
  const startTime = clock()

  if (!args.json) {
    out.log(`[Bench] ${args.agent1} (Player 1) vs ${args.agent2} (Player 2), ${args.games} games`)
  }

  const result = await runBenchmark(
    agents,
    {
      games: args.games,
      timeLimitMs: args['time-limit'],
      maxPlies: args['max-plies'],
      verbose: args.verbose,
    },
    {
      clock,
      onProgress: (completed, total, match) => {
        if (args.json) return
        out.log(
          `[Bench] Game ${completed}/${total}: ${winnerLabel(match.winner)} ` +
            `(${match.reason}, ${match.plies} plies, Player ${match.firstPlayer} first)`
        )
      },
    }
  )

  if (args.json) {
    out.log(JSON.stringify(result, null, 2))
    return
  }

  out.log(`Player 1 ${args.agent1} wins: ${result.player1Wins}`)
  out.log(`Player 2 ${args.agent2} wins: ${result.player2Wins}`)
  out.log(`Draws: ${result.draws}`)
  for (const [reason, count] of Object.entries(result.reasons)) {
    if (count > 0) out.log(`  ${reason}: ${count}`)
  }
  out.log(`Completed in ${formatDurationMs(clock() - startTime)}`)
}

async function playCommand(args: CliArgs, out: CliOutput, clock: Clock): Promise<void> {
  const agents = createAgents(args, clock)
  const driver = new MatchDriver(
    agents,
    { timeLimitMs: args['time-limit'], maxPlies: args['max-plies'], verbose: args.verbose },
    mulberry32(args.seed)
  )

  out.log(`Player ${driver.turn} moves first`)
  out.log(formatBoard(driver.board))

  await runDriver(driver, clock, (entry, board) => {
    out.log('')
    out.log(
      `Ply ${driver.history.indexOf(entry) + 1}: Player ${entry.player} ${formatMove(entry.move)} ` +
        `[${formatTimeMs(driver.clocks[1], true)} | ${formatTimeMs(driver.clocks[2], true)}]`
    )
    out.log(formatBoard(board))
  })

  out.log('')
  out.log(`${winnerLabel(driver.winner)} (${driver.reason ?? 'unfinished'})`)
}

function agentsCommand(out: CliOutput): void {
  const defaultName = agentRegistry.getDefaultName()
  for (const { name, description } of agentRegistry.list()) {
    const marker = name === defaultName ? ' (default)' : ''
    out.log(`${name.padEnd(14)}${description}${marker}`)
  }
}

/**
 * Runs one CLI invocation and returns the exit code.
 */
export async function runCli(
  argv: string[],
  out: CliOutput = consoleOutput,
  clock: Clock = systemClock
): Promise<number> {
  try {
    const { command, args } = parseArgs(argv)
    switch (command) {
      case 'bench':
        await benchCommand(args, out, clock)
        return 0
      case 'play':
        await playCommand(args, out, clock)
        return 0
      case 'agents':
        agentsCommand(out)
        return 0
      default:
        out.error(USAGE)
        return 1
    }
  } catch (err) {
    out.error(`Error: ${getErrorMessage(err)}`)
    return 1
  }
}
