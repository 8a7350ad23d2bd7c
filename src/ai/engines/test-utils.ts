/**
 * Shared fixtures for search tests.
 */

import { type Board, type Move, HOLE, boardFromCells } from '../../game/ostle'
import type { Clock } from '../ai-engine'

/**
 * P1 on (0,2) can knock the P2 piece on (1,2) into the hole, leaving P2
 * with three pieces.
 */
export function knockOffPosition(): Board {
  return boardFromCells([
    [0, 0, 1],
    [1, 0, 1],
    [2, 0, 1],
    [3, 0, 1],
    [0, 2, 1],
    [1, 2, 2],
    [2, 2, HOLE],
    [0, 4, 2],
    [1, 4, 2],
    [2, 4, 2],
  ])
}

export const KNOCK_OFF_MOVE: Move = { x: 0, y: 2, dx: 1, dy: 0 }

/** A clock that never moves, so no deadline ever passes. */
export const frozenClock: Clock = () => 0

/** A clock that advances one millisecond every time it is read. */
export function tickingClock(): Clock {
  let now = 0
  return () => now++
}

/** A clock that reads 0 for its first `reads` reads and far in the future after that. */
export function jumpingClock(reads: number): Clock {
  let count = 0
  return () => (count++ < reads ? 0 : 1e9)
}
