/**
 * Verify command - Report sidecar health, optionally refreshing touched mtimes
 */

import chalk from "chalk";

import type { BatchReport, FileOutcome } from "../batch/runner.js";
import { getCurrentSignature, getDefaultBackup, parseSignatureOverrides } from "../config.js";
import { withTiming } from "../envelope.js";
import { EXIT_CODES, toSidecarKeeperError } from "../errors.js";
import { BatchProgress } from "../progress.js";
import type { VerifyResult, VerifyStatus } from "../types.js";
import { verifyPath } from "../verify/engine.js";
import { fixTouchedSidecar, needsAttention } from "../verify/fix.js";
import { type BatchData, failureExitCode, printJson, toBatchData, wantsJson } from "./output.js";

export interface VerifyCommandOptions {
  recursive: boolean;
  fix: boolean;
  strict: boolean;
  /** JSON overrides for the current pipeline signature */
  pipelineSignature?: string;
  json: boolean;
}

interface VerifyData extends BatchData<VerifyResult> {
  /** Source files whose sidecar was rewritten by --fix */
  fixed: string[];
}

const STATUS_STYLE: Record<VerifyStatus, (text: string) => string> = {
  ok: chalk.green,
  stale: chalk.yellow,
  missing: chalk.magenta,
  corrupt: chalk.red,
};

function printHuman(data: VerifyData): void {
  for (const result of data.results) {
    const status = STATUS_STYLE[result.status](result.status.padEnd(7));
    const reasons = result.reasons.length > 0 ? chalk.gray(` [${result.reasons.join(", ")}]`) : "";
    const action = result.suggested_action !== "noop" ? chalk.cyan(` -> ${result.suggested_action}`) : "";
    const fixed = data.fixed.includes(result.path) ? chalk.green(" (fixed)") : "";
    console.log(`${status} ${result.path}${reasons}${action}${fixed}`);
  }
  for (const error of data.errors) {
    console.log(`${chalk.red("error  ")} ${error.path} ${chalk.red(`[${error.kind}] ${error.message}`)}`);
  }

  const counts = new Map<VerifyStatus, number>();
  for (const result of data.results) {
    counts.set(result.status, (counts.get(result.status) ?? 0) + 1);
  }
  const parts = (["ok", "stale", "missing", "corrupt"] as const).map(
    (status) => `${counts.get(status) ?? 0} ${status}`
  );
  if (data.failed > 0) {
    parts.push(`${data.failed} failed`);
  }
  console.log(chalk.bold(`\n${parts.join(", ")}`));
}

interface FixPass {
  report: BatchReport<VerifyResult>;
  fixed: string[];
}

/**
 * Refresh touched sidecars one file at a time
 * A file whose rewrite fails moves from the results to the errors; the rest carry on
 */
async function applyFixes(
  report: BatchReport<VerifyResult>,
  backup: boolean
): Promise<FixPass> {
  const outcomes: FileOutcome<VerifyResult>[] = [];
  const fixed: string[] = [];

  for (const outcome of report.outcomes) {
    if (!outcome.ok) {
      outcomes.push(outcome);
      continue;
    }
    try {
      if (await fixTouchedSidecar(outcome.value, { backup })) {
        fixed.push(outcome.path);
      }
      outcomes.push(outcome);
    } catch (error) {
      outcomes.push({ path: outcome.path, ok: false, error: toSidecarKeeperError(error) });
    }
  }

  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  return {
    report: { outcomes, succeeded, failed: outcomes.length - succeeded },
    fixed,
  };
}

/**
 * Run the verify command
 */
export async function runVerify(target: string, options: VerifyCommandOptions): Promise<void> {
  const overrides = options.pipelineSignature ? parseSignatureOverrides(options.pipelineSignature) : {};
  const signature = getCurrentSignature(overrides);
  const json = wantsJson(options.json);
  const progress = json ? null : new BatchProgress("Verifying");

  const response = await withTiming(async () => {
    const verified = await verifyPath(target, {
      recursive: options.recursive,
      signature,
      onProgress: progress?.listener,
    });

    const { report, fixed }: FixPass = options.fix
      ? await applyFixes(verified, getDefaultBackup())
      : { report: verified, fixed: [] };

    return { ...toBatchData(report), fixed, report };
  }).finally(() => progress?.stop());

  const { report, ...data } = response.data;
  if (json) {
    printJson({ ...response, data });
  } else {
    printHuman(data);
  }

  const attention = data.results.some(
    (result) => !data.fixed.includes(result.path) && needsAttention(result, options.strict)
  );
  process.exitCode = Math.max(failureExitCode(report), attention ? EXIT_CODES.validation : 0);
}
