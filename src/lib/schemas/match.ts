import { z } from 'zod'

export const playerSchema = z.union([z.literal(1), z.literal(2)])

// Match options
export const matchOptionsSchema = z.object({
  /** Starting clock for each player */
  timeLimitMs: z.number().positive().default(5000),
  /** Ply cap after which the game is scored as a draw */
  maxPlies: z.number().int().positive().default(200),
  firstPlayer: playerSchema.optional(),
  verbose: z.boolean().default(false),
})

export type MatchOptionsInput = z.input<typeof matchOptionsSchema>
export type MatchOptions = z.infer<typeof matchOptionsSchema>

export const driverOptionsSchema = z.object({
  timeLimitMs: z.number().positive().default(5000),
  /** Ply cap after which the game is scored as a draw; uncapped when absent */
  maxPlies: z.number().int().positive().optional(),
  verbose: z.boolean().default(false),
})

export type DriverOptionsInput = z.input<typeof driverOptionsSchema>
export type DriverOptions = z.infer<typeof driverOptionsSchema>

// Benchmark options
export const benchmarkOptionsSchema = z.object({
  games: z.number().int().positive().default(10),
  timeLimitMs: z.number().positive().default(5000),
  maxPlies: z.number().int().positive().default(200),
  verbose: z.boolean().default(false),
})

export type BenchmarkOptionsInput = z.input<typeof benchmarkOptionsSchema>
export type BenchmarkOptions = z.infer<typeof benchmarkOptionsSchema>

// CLI arguments (minimist hands over strings or numbers)
export const cliArgsSchema = z.object({
  agent1: z.string().min(1).default('iterative'),
  agent2: z.string().min(1).default('negamax'),
  games: z.coerce.number().int().positive().default(10),
  'time-limit': z.coerce.number().positive().default(5000),
  'max-plies': z.coerce.number().int().positive().default(200),
  seed: z.coerce.number().int().default(1),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
})

export type CliArgs = z.infer<typeof cliArgsSchema>
