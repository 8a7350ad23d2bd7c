import { z } from 'zod'

// Evaluation weights
export const evalWeightsSchema = z.object({
  /** Base score for a won position; remaining depth is added on top */
  win: z.number().positive(),
  /** Base penalty for a lost position; remaining depth is added on top */
  loss: z.number().positive(),
  piece: z.number().min(0),
  mobility: z.number().min(0),
  center: z.number().min(0),
})

export type EvalWeights = z.infer<typeof evalWeightsSchema>

/**
 * Material first, then mobility, then the five central cells.
 * Losses weigh double so the search prefers risky play over a sure loss.
 */
export const DEFAULT_EVAL_WEIGHTS: EvalWeights = {
  win: 10000,
  loss: 20000,
  piece: 100,
  mobility: 10,
  center: 10,
}

/** Only wins and losses count; every other position scores zero. */
export const OUTCOME_ONLY_WEIGHTS: EvalWeights = {
  win: 10000,
  loss: 20000,
  piece: 0,
  mobility: 0,
  center: 0,
}

/** Heavy material weighting with a small center bonus and no mobility term. */
export const MATERIAL_WEIGHTS: EvalWeights = {
  win: 10000,
  loss: 10000,
  piece: 1000,
  mobility: 0,
  center: 10,
}

// Depth selection
export const depthStepSchema = z.object({
  /** Applies while the remaining clock is strictly below this many ms */
  below: z.number().positive(),
  depth: z.number().int().min(1),
})

export type DepthStep = z.infer<typeof depthStepSchema>

export const moveOrderingSchema = z.enum(['none', 'shuffle', 'captures'])

export type MoveOrdering = z.infer<typeof moveOrderingSchema>

const safetySchema = z.number().gt(0).max(1)

export const timeAllocationSchema = z.object({
  /** Expected number of own moves still to play */
  movesToGo: z.number().int().positive().default(20),
  minMs: z.number().min(0).default(20),
  maxMs: z.number().positive().default(2000),
  /** Fraction of the slice the search may actually use */
  safety: safetySchema.default(0.9),
})

export type TimeAllocation = z.infer<typeof timeAllocationSchema>

// Engine configurations
export const alphaBetaConfigSchema = z.object({
  depth: z.number().int().min(1).max(12).default(5),
  ordering: moveOrderingSchema.default('shuffle'),
  weights: evalWeightsSchema.default(OUTCOME_ONLY_WEIGHTS),
  safety: safetySchema.default(0.9),
})

export type AlphaBetaConfig = z.infer<typeof alphaBetaConfigSchema>

export const negamaxConfigSchema = z.object({
  depthTable: z.array(depthStepSchema).default([
    { below: 1000, depth: 3 },
    { below: 3000, depth: 4 },
  ]),
  maxDepth: z.number().int().min(1).max(12).default(5),
  ordering: moveOrderingSchema.default('shuffle'),
  weights: evalWeightsSchema.default(DEFAULT_EVAL_WEIGHTS),
  safety: safetySchema.default(0.9),
})

export type NegamaxConfig = z.infer<typeof negamaxConfigSchema>

export const captureFirstConfigSchema = z.object({
  depthTable: z.array(depthStepSchema).default([{ below: 500, depth: 2 }]),
  maxDepth: z.number().int().min(1).max(12).default(3),
  weights: evalWeightsSchema.default(MATERIAL_WEIGHTS),
  immediateWin: z.boolean().default(true),
  safety: safetySchema.default(0.9),
})

export type CaptureFirstConfig = z.infer<typeof captureFirstConfigSchema>

export const iterativeConfigSchema = z.object({
  maxDepth: z.number().int().min(1).max(32).default(8),
  weights: evalWeightsSchema.default(DEFAULT_EVAL_WEIGHTS),
  immediateWin: z.boolean().default(true),
  time: timeAllocationSchema.default({}),
})

export type IterativeConfig = z.infer<typeof iterativeConfigSchema>
