import { describe, it, expect } from 'vitest'
import { boardFromCells, createInitialBoard } from '../game/ostle'
import {
  AgentRegistry,
  NoLegalMovesError,
  type SearchAgent,
  requireLegalMoves,
} from './ai-engine'

function stubAgent(name: string): SearchAgent {
  return {
    name,
    description: `${name} stub`,
    async calcBestMove() {
      return {
        move: { x: 0, y: 0, dx: 0, dy: 1 },
        score: null,
        searchInfo: { depth: 0, nodesSearched: 0, timeUsed: 0 },
      }
    },
  }
}

describe('AgentRegistry', () => {
  it('makes the first registration the default', () => {
    const registry = new AgentRegistry()
    registry.register('first', 'first stub', () => stubAgent('first'))
    registry.register('second', 'second stub', () => stubAgent('second'))

    expect(registry.getDefaultName()).toBe('first')
    expect(registry.names()).toEqual(['first', 'second'])
  })

  it('lists names with descriptions', () => {
    const registry = new AgentRegistry()
    registry.register('first', 'first stub', () => stubAgent('first'))

    expect(registry.list()).toEqual([{ name: 'first', description: 'first stub' }])
  })

  it('hands options to the factory', () => {
    const registry = new AgentRegistry()
    let seen: unknown = null
    registry.register('first', 'first stub', (options) => {
      seen = options.config
      return stubAgent('first')
    })

    registry.create('first', { config: { depth: 3 } })
    expect(seen).toEqual({ depth: 3 })
  })

  it('moves the default on when it is unregistered', () => {
    const registry = new AgentRegistry()
    registry.register('first', 'first stub', () => stubAgent('first'))
    registry.register('second', 'second stub', () => stubAgent('second'))

    registry.unregister('first')
    expect(registry.getDefaultName()).toBe('second')
    expect(registry.has('first')).toBe(false)

    registry.unregister('second')
    expect(registry.getDefaultName()).toBeNull()
  })

  it('refuses an unknown default', () => {
    const registry = new AgentRegistry()
    expect(() => registry.setDefault('missing')).toThrow('Agent "missing" not registered')
  })

  it('names the known agents when creation fails', () => {
    const registry = new AgentRegistry()
    registry.register('first', 'first stub', () => stubAgent('first'))
    expect(() => registry.create('missing')).toThrow(
      'Agent "missing" not registered (known: first)'
    )
  })
})

describe('requireLegalMoves', () => {
  it('returns the moves when there are some', () => {
    expect(requireLegalMoves(createInitialBoard(), 2)).toHaveLength(17)
  })

  it('throws NoLegalMovesError naming the player', () => {
    const board = boardFromCells([[0, 0, 1]])
    expect(() => requireLegalMoves(board, 2)).toThrow(NoLegalMovesError)
    expect(() => requireLegalMoves(board, 2)).toThrow('Player 2 has no legal moves')
  })
})
