/**
 * Per-file batch execution
 *
 * Files are independent, so they run in windows of `concurrency` using
 * Promise.allSettled. A failing file is recorded and the batch carries on;
 * outcomes keep the input order. Progress goes to an optional listener, and
 * callers that want to drive the loop themselves can consume `iterateBatch`.
 */
import { debugBatch } from "../debug.js";
import { type SidecarKeeperError, toSidecarKeeperError } from "../errors.js";
import type { ProgressListener } from "../types.js";

export type FileOutcome<T> =
  | { path: string; ok: true; value: T }
  | { path: string; ok: false; error: SidecarKeeperError };

export interface BatchReport<T> {
  outcomes: FileOutcome<T>[];
  succeeded: number;
  failed: number;
}

export interface BatchOptions<T = unknown> {
  /** Files processed at once (default 1) */
  concurrency?: number;
  onProgress?: ProgressListener;
  /** Size in bytes reported with a successful `file_completed` event */
  sizeOf?: (value: T) => number | undefined;
}

export type FileWorker<T> = (filePath: string) => Promise<T>;

/**
 * Run a worker over files lazily, yielding each outcome as its window settles
 */
export async function* iterateBatch<T>(
  files: readonly string[],
  worker: FileWorker<T>,
  options: BatchOptions<T> = {}
): AsyncGenerator<FileOutcome<T>> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const notify = options.onProgress ?? (() => {});

  for (let start = 0; start < files.length; start += concurrency) {
    const chunk = files.slice(start, start + concurrency);

    const settledResults = await Promise.allSettled(
      chunk.map(async (filePath) => {
        notify({ type: "file_started", path: filePath });
        return worker(filePath);
      })
    );

    for (let i = 0; i < chunk.length; i++) {
      const filePath = chunk[i];
      const settled = settledResults[i];

      if (settled.status === "fulfilled") {
        const size = options.sizeOf?.(settled.value);
        notify({
          type: "file_completed",
          path: filePath,
          success: true,
          ...(size === undefined ? {} : { size_bytes: size }),
        });
        yield { path: filePath, ok: true, value: settled.value };
      } else {
        const error = toSidecarKeeperError(settled.reason);
        debugBatch.error(`Failed: ${filePath}`, error);
        notify({ type: "file_completed", path: filePath, success: false, error: error.message });
        yield { path: filePath, ok: false, error };
      }
    }
  }
}

/**
 * Run a worker over every file and collect all outcomes
 */
export async function runBatch<T>(
  files: readonly string[],
  worker: FileWorker<T>,
  options: BatchOptions<T> = {}
): Promise<BatchReport<T>> {
  const report: BatchReport<T> = { outcomes: [], succeeded: 0, failed: 0 };

  for await (const outcome of iterateBatch(files, worker, options)) {
    report.outcomes.push(outcome);
    if (outcome.ok) {
      report.succeeded++;
    } else {
      report.failed++;
    }
  }

  debugBatch("Batch done: %d succeeded, %d failed", report.succeeded, report.failed);
  return report;
}
