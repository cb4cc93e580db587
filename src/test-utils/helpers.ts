/**
 * Test helper utilities
 */

/**
 * Wait for timers and pending I/O callbacks to run
 */
export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
