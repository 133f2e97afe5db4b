/**
 * Stagnation detection over the process-variable history.
 */

/**
 * True when the last `window` samples span less than `threshold`.
 * Shorter histories are never stagnant.
 */
export function detectStagnation(history: readonly number[], threshold: number, window: number): boolean {
  if (window < 1 || history.length < window) return false
  const recent = history.slice(-window)
  return Math.max(...recent) - Math.min(...recent) < threshold
}
