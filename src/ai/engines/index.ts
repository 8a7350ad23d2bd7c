/**
 * Search Agents Index
 *
 * Registers every agent with the global registry.
 * Import this module to ensure agents are registered before use.
 */

import { type AgentFactory, agentRegistry } from '../ai-engine'
import { AlphaBetaEngine } from './alphabeta-engine'
import { CaptureFirstEngine } from './capture-first-engine'
import { IterativeEngine } from './iterative-engine'
import { NegamaxEngine } from './negamax-engine'
import { RandomEngine } from './random-engine'

const factories: AgentFactory[] = [
  (options) => new AlphaBetaEngine(options),
  (options) => new NegamaxEngine(options),
  (options) => new CaptureFirstEngine(options),
  (options) => new IterativeEngine(options),
  (options) => new RandomEngine(options),
]

// Agents are cheap to build; a default instance supplies name and description
for (const factory of factories) {
  const probe = factory({})
  agentRegistry.register(probe.name, probe.description, factory)
}

// Strongest search is the default
agentRegistry.setDefault('iterative')

export { AlphaBetaEngine, CaptureFirstEngine, IterativeEngine, NegamaxEngine, RandomEngine }

export { agentRegistry }
