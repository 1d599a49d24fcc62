import { performance } from "node:perf_hooks";

export type DurationReporter = (label: string, duration: number) => void;

/**
 * Run `block` and report how long it took, whether it returns or throws
 */
export async function measure<T>(
  label: string,
  block: () => Promise<T> | T,
  report: DurationReporter,
): Promise<T> {
  const start = performance.now();
  try {
    return await block();
  } finally {
    report(label, performance.now() - start);
  }
}

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}
