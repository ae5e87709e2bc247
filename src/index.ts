#!/usr/bin/env node
/**
 * sidecar-keeper CLI
 * Keeps JSON metadata sidecars of a photo library healthy
 *
 * This file sets up the CLI using yargs and delegates to command handlers
 * in src/commands/ directory.
 */
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { runMigrate, runScan, runVerify, reportError } from "./commands/index.js";
import { getDefaultBackup, getProducerVersion } from "./config.js";

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("sidecar-keeper")
    .usage("$0 <command> <path> [options]")
    .command(
      "scan <path>",
      "Fingerprint files and write their sidecars",
      (yargs) =>
        yargs
          .positional("path", {
            describe: "Source file or directory",
            type: "string",
            demandOption: true,
          })
          .option("recursive", {
            alias: "r",
            type: "boolean",
            default: false,
            describe: "Descend into subdirectories",
          })
          .option("dry-run", {
            type: "boolean",
            default: false,
            describe: "Build sidecars without writing them",
          })
          .option("backup", {
            type: "boolean",
            default: getDefaultBackup(),
            describe: "Keep previous sidecars as .bak1-.bak3 (--no-backup to skip)",
          })
          .option("json", {
            type: "boolean",
            default: false,
            describe: "Output as JSON for scripting",
          }),
      async (argv) => {
        await runScan(argv.path, {
          recursive: argv.recursive,
          dryRun: argv.dryRun,
          backup: argv.backup,
          json: argv.json,
        });
      }
    )
    .command(
      "verify <path>",
      "Check sidecars against their files and the current pipeline",
      (yargs) =>
        yargs
          .positional("path", {
            describe: "Source file or directory",
            type: "string",
            demandOption: true,
          })
          .option("recursive", {
            alias: "r",
            type: "boolean",
            default: false,
            describe: "Descend into subdirectories",
          })
          .option("fix", {
            type: "boolean",
            default: false,
            describe: "Re-record mtimes of files touched without content change",
          })
          .option("strict", {
            type: "boolean",
            default: false,
            describe: "Fail on informational reasons too",
          })
          .option("pipeline-signature", {
            type: "string",
            describe: "JSON object overriding fields of the current pipeline signature",
          })
          .option("json", {
            type: "boolean",
            default: false,
            describe: "Output as JSON for scripting",
          }),
      async (argv) => {
        await runVerify(argv.path, {
          recursive: argv.recursive,
          fix: argv.fix,
          strict: argv.strict,
          pipelineSignature: argv.pipelineSignature,
          json: argv.json,
        });
      }
    )
    .command(
      "migrate <path>",
      "Migrate sidecars to another schema version",
      (yargs) =>
        yargs
          .positional("path", {
            describe: "Source file or directory",
            type: "string",
            demandOption: true,
          })
          .option("to", {
            type: "string",
            demandOption: true,
            describe: "Target schema version",
          })
          .option("from", {
            type: "string",
            describe: "Expected current schema version (read from each sidecar if omitted)",
          })
          .option("recursive", {
            alias: "r",
            type: "boolean",
            default: false,
            describe: "Descend into subdirectories",
          })
          .option("dry-run", {
            type: "boolean",
            default: false,
            describe: "Report what would change without writing",
          })
          .option("backup", {
            type: "boolean",
            default: getDefaultBackup(),
            describe: "Keep previous sidecars as .bak1-.bak3 (--no-backup to skip)",
          })
          .option("json", {
            type: "boolean",
            default: false,
            describe: "Output as JSON for scripting",
          }),
      async (argv) => {
        await runMigrate(argv.path, {
          to: argv.to,
          from: argv.from,
          recursive: argv.recursive,
          dryRun: argv.dryRun,
          backup: argv.backup,
          json: argv.json,
        });
      }
    )
    .demandCommand(1, "You need at least one command")
    .strict()
    .help()
    .version(getProducerVersion())
    .parseAsync();
}

// Run CLI
main().catch((err: unknown) => {
  reportError(err);
});
