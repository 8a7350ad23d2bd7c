import { describe, it, expect } from 'vitest'
import { type Move, HOLE, boardFromCells, createInitialBoard } from '../../game/ostle'
import { timeAllocationSchema } from '../../lib/schemas/engine'
import {
  DEFAULT_EVAL_WEIGHTS,
  MATERIAL_WEIGHTS,
  Deadline,
  allocateMoveTime,
  classifyMove,
  depthForTime,
  evaluatePosition,
  findImmediateWin,
  isWinningScore,
  orderMoves,
  terminalScore,
} from './engine-utils'
import { KNOCK_OFF_MOVE, knockOffPosition } from './test-utils'

const never = () => {
  throw new Error('rng should not be used')
}

describe('evaluatePosition', () => {
  it('scores the symmetric start as even', () => {
    expect(evaluatePosition(createInitialBoard(), 1, DEFAULT_EVAL_WEIGHTS)).toBe(0)
  })

  it('weighs material from each side', () => {
    const board = boardFromCells([
      [0, 0, 1],
      [1, 0, 1],
      [2, 0, 1],
      [3, 0, 1],
      [4, 0, 1],
      [0, 4, 2],
      [1, 4, 2],
      [2, 4, 2],
      [3, 4, 2],
      [2, 2, HOLE],
    ])
    expect(evaluatePosition(board, 1, MATERIAL_WEIGHTS)).toBe(1000)
    expect(evaluatePosition(board, 2, MATERIAL_WEIGHTS)).toBe(-1000)
  })

  it('counts the five central cells', () => {
    const board = boardFromCells([
      [1, 2, 1],
      [2, 1, 1],
      [3, 2, 2],
    ])
    const weights = { win: 1, loss: 1, piece: 0, mobility: 0, center: 10 }
    expect(evaluatePosition(board, 1, weights)).toBe(10)
  })

  it('compares move counts', () => {
    // P1 corner piece: 2 moves, P2: 3 + 2 moves, both share 4 hole moves
    const board = boardFromCells([
      [0, 0, 1],
      [2, 0, 2],
      [4, 4, 2],
      [2, 2, HOLE],
    ])
    const weights = { win: 1, loss: 1, piece: 0, mobility: 1, center: 0 }
    expect(evaluatePosition(board, 1, weights)).toBe(-3)
  })
})

describe('terminalScore', () => {
  const board = boardFromCells([
    [0, 0, 1],
    [1, 0, 1],
    [2, 0, 1],
    [3, 0, 1],
    [4, 0, 1],
    [0, 4, 2],
    [1, 4, 2],
    [2, 4, 2],
    [2, 2, HOLE],
  ])

  it('adds remaining depth to a win', () => {
    expect(terminalScore(board, 1, 2, DEFAULT_EVAL_WEIGHTS)).toBe(10002)
  })

  it('adds remaining depth to a loss', () => {
    expect(terminalScore(board, 2, 2, DEFAULT_EVAL_WEIGHTS)).toBe(-20002)
  })

  it('is null while the game is open', () => {
    expect(terminalScore(createInitialBoard(), 1, 3, DEFAULT_EVAL_WEIGHTS)).toBeNull()
  })
})

describe('isWinningScore', () => {
  it('uses the smaller of the two outcome weights', () => {
    expect(isWinningScore(10000, DEFAULT_EVAL_WEIGHTS)).toBe(true)
    expect(isWinningScore(9999, DEFAULT_EVAL_WEIGHTS)).toBe(false)
    expect(isWinningScore(-10001, DEFAULT_EVAL_WEIGHTS)).toBe(true)
  })
})

describe('classifyMove', () => {
  const board = boardFromCells([
    [0, 0, 1],
    [1, 0, 2],
    [0, 2, 1],
    [1, 2, 2],
    [2, 2, HOLE],
  ])

  it('spots an opponent pushed into the hole', () => {
    expect(classifyMove(board, { x: 0, y: 2, dx: 1, dy: 0 }, 1)).toBe('capture')
  })

  it('spots an opponent pushed off the edge', () => {
    const edge = boardFromCells([
      [3, 0, 1],
      [4, 0, 2],
    ])
    expect(classifyMove(edge, { x: 3, y: 0, dx: 1, dy: 0 }, 1)).toBe('capture')
  })

  it('spots an opponent moved within the board', () => {
    expect(classifyMove(board, { x: 0, y: 0, dx: 1, dy: 0 }, 1)).toBe('push')
  })

  it('treats walking off the edge as quiet', () => {
    expect(classifyMove(board, { x: 0, y: 0, dx: -1, dy: 0 }, 1)).toBe('quiet')
  })

  it('treats hole moves as quiet', () => {
    expect(classifyMove(board, { x: 2, y: 2, dx: 0, dy: 1 }, 1)).toBe('quiet')
  })

  it('does not count an own piece falling off as a capture', () => {
    const chain = boardFromCells([
      [2, 0, 1],
      [3, 0, 2],
      [4, 0, 1],
    ])
    expect(classifyMove(chain, { x: 2, y: 0, dx: 1, dy: 0 }, 1)).toBe('push')
  })
})

describe('orderMoves', () => {
  const board = boardFromCells([
    [0, 0, 1],
    [1, 0, 2],
    [0, 2, 1],
    [1, 2, 2],
    [2, 2, HOLE],
  ])
  const quiet1: Move = { x: 0, y: 0, dx: 0, dy: 1 }
  const push: Move = { x: 0, y: 0, dx: 1, dy: 0 }
  const quiet2: Move = { x: 0, y: 2, dx: 0, dy: -1 }
  const capture: Move = { x: 0, y: 2, dx: 1, dy: 0 }

  it('puts captures, then pushes, then the rest in stable order', () => {
    const ordered = orderMoves(board, [quiet1, push, quiet2, capture], 1, 'captures', never)
    expect(ordered).toEqual([capture, push, quiet1, quiet2])
  })

  it('keeps generation order without ordering', () => {
    const moves = [quiet1, push, capture]
    const ordered = orderMoves(board, moves, 1, 'none', never)
    expect(ordered).toEqual(moves)
    expect(ordered).not.toBe(moves)
  })

  it('shuffles with the given rng', () => {
    const ordered = orderMoves(board, [quiet1, push, capture], 1, 'shuffle', () => 0)
    expect(ordered).toEqual([push, capture, quiet1])
  })

  it('moves the preferred move to the front', () => {
    const ordered = orderMoves(board, [quiet1, push, capture], 1, 'none', never, {
      x: 0,
      y: 2,
      dx: 1,
      dy: 0,
    })
    expect(ordered).toEqual([capture, quiet1, push])
  })

  it('ignores a preferred move that is not in the list', () => {
    const ordered = orderMoves(board, [quiet1, push], 1, 'none', never, capture)
    expect(ordered).toEqual([quiet1, push])
  })
})

describe('findImmediateWin', () => {
  it('finds the knock-off that leaves three pieces', () => {
    const board = knockOffPosition()
    const moves = [{ x: 0, y: 2, dx: -1, dy: 0 }, KNOCK_OFF_MOVE]
    expect(findImmediateWin(board, moves, 1)).toEqual(KNOCK_OFF_MOVE)
  })

  it('returns null when nothing wins', () => {
    const board = createInitialBoard()
    expect(findImmediateWin(board, [{ x: 0, y: 0, dx: 0, dy: 1 }], 1)).toBeNull()
  })
})

describe('Deadline', () => {
  it('expires at its time and stays expired', () => {
    let now = 0
    const deadline = Deadline.after(() => now, 10)
    now = 5
    expect(deadline.expired()).toBe(false)
    now = 10
    expect(deadline.expired()).toBe(true)
    now = 0
    expect(deadline.expired()).toBe(true)
  })

  it('reports a passed deadline without reading the clock', () => {
    let reads = 0
    const deadline = new Deadline(() => {
      reads++
      return 10
    }, 10)

    expect(deadline.seenExpired).toBe(false)
    expect(reads).toBe(0)
    expect(deadline.expired()).toBe(true)
    expect(deadline.seenExpired).toBe(true)
    expect(reads).toBe(1)
  })

  it('never expires when built with never()', () => {
    expect(Deadline.never().expired()).toBe(false)
  })
})

describe('allocateMoveTime', () => {
  const time = timeAllocationSchema.parse({})

  it('splits the clock over the moves to go', () => {
    expect(allocateMoveTime(5000, time)).toBeCloseTo(225)
  })

  it('clamps to the minimum slice', () => {
    expect(allocateMoveTime(100, time)).toBeCloseTo(18)
  })

  it('never exceeds the remaining clock', () => {
    expect(allocateMoveTime(10, time)).toBeCloseTo(9)
  })

  it('clamps to the maximum slice', () => {
    expect(allocateMoveTime(100000, time)).toBeCloseTo(1800)
  })

  it('gives nothing once the clock is spent', () => {
    expect(allocateMoveTime(0, time)).toBe(0)
    expect(allocateMoveTime(-5, time)).toBe(0)
  })
})

describe('depthForTime', () => {
  const table = [
    { below: 3000, depth: 4 },
    { below: 1000, depth: 3 },
  ]

  it('picks the first threshold the clock is below', () => {
    expect(depthForTime(999, table, 5)).toBe(3)
    expect(depthForTime(1000, table, 5)).toBe(4)
    expect(depthForTime(2999, table, 5)).toBe(4)
  })

  it('uses the maximum depth with time to spare', () => {
    expect(depthForTime(3000, table, 5)).toBe(5)
  })
})
