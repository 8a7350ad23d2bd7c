import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { boardFromCells, createInitialBoard, isLegalMove } from '../../game/ostle'
import { mulberry32 } from '../../lib/rng'
import { NoLegalMovesError } from '../ai-engine'
import { CaptureFirstEngine, NegamaxEngine, RandomEngine, agentRegistry } from './index'
import { KNOCK_OFF_MOVE, frozenClock, knockOffPosition, tickingClock } from './test-utils'

const SEARCH_AGENTS = ['alphabeta', 'negamax', 'capture-first', 'iterative']

describe('agent registration', () => {
  it('registers every agent', () => {
    expect(agentRegistry.names()).toEqual([
      'alphabeta',
      'negamax',
      'capture-first',
      'iterative',
      'random',
    ])
  })

  it('defaults to iterative deepening', () => {
    expect(agentRegistry.getDefaultName()).toBe('iterative')
  })

  it('rejects unknown names', () => {
    expect(() => agentRegistry.create('grandmaster')).toThrow(
      'Agent "grandmaster" not registered'
    )
  })

  it('validates agent configuration', () => {
    expect(() => agentRegistry.create('alphabeta', { config: { depth: 0 } })).toThrow(ZodError)
  })
})

describe.each(agentRegistry.names())('%s agent', (name) => {
  it('returns a legal opening move', async () => {
    const agent = agentRegistry.create(name, { rng: mulberry32(1), clock: tickingClock() })
    const board = createInitialBoard()
    const result = await agent.calcBestMove(board, null, 1, 500)

    expect(agent.name).toBe(name)
    expect(isLegalMove(board, 1, result.move)).toBe(true)
  })

  it('rejects when the player has no moves', async () => {
    const agent = agentRegistry.create(name, { rng: mulberry32(1), clock: frozenClock })
    const board = boardFromCells([[0, 4, 2]])

    await expect(agent.calcBestMove(board, null, 1, 500)).rejects.toBeInstanceOf(
      NoLegalMovesError
    )
  })
})

describe.each(SEARCH_AGENTS)('%s search', (name) => {
  it('takes a winning knock-off', async () => {
    const agent = agentRegistry.create(name, { rng: mulberry32(3), clock: frozenClock })
    const result = await agent.calcBestMove(knockOffPosition(), null, 1, 500)

    expect(result.move).toEqual(KNOCK_OFF_MOVE)
  })
})

describe('NegamaxEngine', () => {
  it('searches deeper with more time on the clock', () => {
    const engine = new NegamaxEngine()
    expect(engine.depthFor(999)).toBe(3)
    expect(engine.depthFor(1000)).toBe(4)
    expect(engine.depthFor(2999)).toBe(4)
    expect(engine.depthFor(3000)).toBe(5)
  })

  it('accepts a custom depth table', () => {
    const engine = new NegamaxEngine({ config: { depthTable: [], maxDepth: 2 } })
    expect(engine.depthFor(100)).toBe(2)
  })
})

describe('CaptureFirstEngine', () => {
  it('drops to depth 2 when short of time', () => {
    const engine = new CaptureFirstEngine()
    expect(engine.depthFor(499)).toBe(2)
    expect(engine.depthFor(500)).toBe(3)
  })
})

describe('RandomEngine', () => {
  it('draws from the legal moves with the given rng', async () => {
    const engine = new RandomEngine({ rng: () => 0, clock: frozenClock })
    const result = await engine.calcBestMove(createInitialBoard(), null, 1, 500)

    expect(result).toEqual({
      move: { x: 0, y: 0, dx: 1, dy: 0 },
      score: null,
      searchInfo: { depth: 0, nodesSearched: 0, timeUsed: 0 },
    })
  })
})
