export type Clock = () => number

/**
 * Epoch-ms clock that never returns the same value twice, so an event stamped
 * after another always has a strictly larger timestamp.
 */
export function createMonotonicClock(now: () => number = Date.now): Clock {
  let last = -1
  return () => {
    const value = Math.max(now(), last + 1)
    last = value
    return value
  }
}

/**
 * Filesystem-safe run id from a start time: 2026-10-19T04-23-00-000Z
 */
export function runIdFor(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-")
}
