/**
 * Seeded randomness. Anything that shuffles or picks takes an `Rng` so that
 * games and searches can be replayed from a seed.
 */

export type Rng = () => number

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0
  return function () {
    t += 0x6d2b79f5
    let x = t
    x = Math.imul(x ^ (x >>> 15), x | 1)
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

export function pickOne<T>(arr: readonly T[], rng: Rng): T {
  if (arr.length === 0) throw new Error('pickOne called with empty array')
  const idx = Math.floor(rng() * arr.length)
  return arr[Math.min(idx, arr.length - 1)]
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(arr: readonly T[], rng: Rng): T[] {
  const out = [...arr]
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.min(Math.floor(rng() * (i + 1)), i)
    const tmp = out[i]
    out[i] = out[j]
    out[j] = tmp
  }
  return out
}
