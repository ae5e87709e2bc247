/**
 * Shared CLI output helpers
 */
import type { BatchReport } from "../batch/runner.js";
import { type ErrorKind, toSidecarKeeperError } from "../errors.js";

export interface FileError {
  path: string;
  kind: ErrorKind;
  message: string;
}

export interface BatchData<T> {
  results: T[];
  errors: FileError[];
  succeeded: number;
  failed: number;
}

/**
 * JSON is emitted when asked for, or whenever stdout is piped
 */
export function wantsJson(jsonFlag: boolean, stdoutIsTTY: boolean = process.stdout.isTTY === true): boolean {
  return jsonFlag || !stdoutIsTTY;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Split a batch report into successful values and per-file errors
 */
export function toBatchData<T>(report: BatchReport<T>): BatchData<T> {
  const results: T[] = [];
  const errors: FileError[] = [];
  for (const outcome of report.outcomes) {
    if (outcome.ok) {
      results.push(outcome.value);
    } else {
      errors.push({ path: outcome.path, ...outcome.error.toJSON() });
    }
  }
  return { results, errors, succeeded: report.succeeded, failed: report.failed };
}

/**
 * Highest exit code among failed files, 0 when none failed
 */
export function failureExitCode<T>(report: BatchReport<T>): number {
  let code = 0;
  for (const outcome of report.outcomes) {
    if (!outcome.ok) {
      code = Math.max(code, outcome.error.exitCode);
    }
  }
  return code;
}

/**
 * Print an error as `{"kind","message"}` on stderr and set the exit code
 */
export function reportError(error: unknown): void {
  const normalized = toSidecarKeeperError(error);
  console.error(JSON.stringify(normalized.toJSON()));
  process.exitCode = normalized.exitCode;
}
