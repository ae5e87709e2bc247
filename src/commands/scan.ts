/**
 * Scan command - Write fresh sidecars for source files
 */

import chalk from "chalk";

import { withTiming } from "../envelope.js";
import { BatchProgress } from "../progress.js";
import { scanPath } from "../scan.js";
import type { ScanResult } from "../types.js";
import { type BatchData, failureExitCode, printJson, toBatchData, wantsJson } from "./output.js";

export interface ScanCommandOptions {
  recursive: boolean;
  dryRun: boolean;
  backup: boolean;
  json: boolean;
}

function printHuman(data: BatchData<ScanResult>, dryRun: boolean): void {
  for (const result of data.results) {
    const verb = dryRun ? "would write" : "wrote";
    const backup = result.backup_path ? chalk.gray(` (backup: ${result.backup_path})`) : "";
    console.log(`${chalk.green("✓")} ${result.path} ${chalk.gray(`${verb} ${result.sidecar_path}`)}${backup}`);
  }
  for (const error of data.errors) {
    console.log(`${chalk.red("✗")} ${error.path} ${chalk.red(`[${error.kind}] ${error.message}`)}`);
  }

  const summary = `${data.succeeded} scanned, ${data.failed} failed`;
  console.log(data.failed > 0 ? chalk.yellow(`\n${summary}`) : chalk.green(`\n${summary}`));
}

/**
 * Run the scan command
 */
export async function runScan(target: string, options: ScanCommandOptions): Promise<void> {
  const json = wantsJson(options.json);
  const progress = json ? null : new BatchProgress("Scanning");

  const response = await withTiming(async () =>
    scanPath(target, {
      recursive: options.recursive,
      dryRun: options.dryRun,
      backup: options.backup,
      onProgress: progress?.listener,
    })
  ).finally(() => progress?.stop());

  const data = toBatchData(response.data);
  if (json) {
    printJson({ ...response, data });
  } else {
    printHuman(data, options.dryRun);
  }

  process.exitCode = failureExitCode(response.data);
}
