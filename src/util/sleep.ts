/**
 * Resolves after the given number of milliseconds (immediately for zero or negative values)
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
