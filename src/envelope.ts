/**
 * Timing envelope for results that cross a process boundary
 */
import type { OperationResponse } from "./types.js";

export function createOperationResponse<T>(
  data: T,
  startedAt: Date,
  finishedAt: Date = new Date()
): OperationResponse<T> {
  return {
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    duration_ms: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    data,
  };
}

/**
 * Run an operation and wrap its result with start/finish times
 * Errors propagate unwrapped
 */
export async function withTiming<T>(
  operation: () => Promise<T>,
  clock: () => Date = () => new Date()
): Promise<OperationResponse<T>> {
  const startedAt = clock();
  const data = await operation();
  return createOperationResponse(data, startedAt, clock());
}
