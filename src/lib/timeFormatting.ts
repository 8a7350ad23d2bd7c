/**
 * Time formatting for clocks and benchmark output.
 */

/**
 * Formats milliseconds as M:SS (e.g., "5:03", "0:45")
 * Optionally shows tenths of seconds for precision timing.
 *
 * Negative values (an overdrawn clock) are shown with a leading minus.
 *
 * @param showTenths - If true, shows tenths of seconds (e.g., "0:05.3")
 */
export function formatTimeMs(ms: number, showTenths: boolean = false): string {
  const sign = ms < 0 ? '-' : ''
  const abs = Math.abs(ms)
  const totalSeconds = Math.floor(abs / 1000)
  const minutes = Math.floor(totalSeconds / 60)
  const seconds = totalSeconds % 60

  const base = `${sign}${minutes}:${seconds.toString().padStart(2, '0')}`

  if (showTenths) {
    const tenths = Math.floor((abs % 1000) / 100)
    return `${base}.${tenths}`
  }

  return base
}

/**
 * Formats a short duration in milliseconds with one decimal, e.g. "12.3ms".
 */
export function formatDurationMs(ms: number): string {
  return `${ms.toFixed(1)}ms`
}
