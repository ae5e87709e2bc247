/**
 * Migrate command - Move sidecars between schema versions
 */

import chalk from "chalk";

import { withTiming } from "../envelope.js";
import { migratePath } from "../migrate/engine.js";
import { createMigrationRegistry } from "../migrate/registry.js";
import { BatchProgress } from "../progress.js";
import type { MigrationResult } from "../types.js";
import { type BatchData, failureExitCode, printJson, toBatchData, wantsJson } from "./output.js";

export interface MigrateCommandOptions {
  to: string;
  from?: string;
  recursive: boolean;
  dryRun: boolean;
  backup: boolean;
  json: boolean;
}

function printHuman(data: BatchData<MigrationResult>): void {
  for (const result of data.results) {
    const arrow = `${result.from} -> ${result.to}`;
    if (!result.migrated) {
      console.log(`${chalk.gray("-")} ${result.path} ${chalk.gray(`already at ${result.to}`)}`);
    } else if (result.dry_run) {
      console.log(`${chalk.cyan("~")} ${result.path} ${chalk.cyan(`would migrate ${arrow}`)}`);
    } else {
      const backup = result.backup_path ? chalk.gray(` (backup: ${result.backup_path})`) : "";
      console.log(`${chalk.green("✓")} ${result.path} ${chalk.green(`migrated ${arrow}`)}${backup}`);
    }
  }
  for (const error of data.errors) {
    console.log(`${chalk.red("✗")} ${error.path} ${chalk.red(`[${error.kind}] ${error.message}`)}`);
  }

  const migrated = data.results.filter((r) => r.migrated).length;
  const summary = `${migrated} migrated, ${data.results.length - migrated} unchanged, ${data.failed} failed`;
  console.log(data.failed > 0 ? chalk.yellow(`\n${summary}`) : chalk.green(`\n${summary}`));
}

/**
 * Run the migrate command
 */
export async function runMigrate(target: string, options: MigrateCommandOptions): Promise<void> {
  const registry = createMigrationRegistry();
  const json = wantsJson(options.json);
  const progress = json ? null : new BatchProgress("Migrating");

  const response = await withTiming(async () =>
    migratePath(target, {
      to: options.to,
      from: options.from,
      recursive: options.recursive,
      dryRun: options.dryRun,
      backup: options.backup,
      registry,
      onProgress: progress?.listener,
    })
  ).finally(() => progress?.stop());

  const data = toBatchData(response.data);
  if (json) {
    printJson({ ...response, data });
  } else {
    printHuman(data);
  }

  process.exitCode = failureExitCode(response.data);
}
