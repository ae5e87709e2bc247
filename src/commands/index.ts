/**
 * CLI Commands module
 * Re-exports all command handlers for the CLI
 */

export { runScan } from "./scan.js";
export { runVerify } from "./verify.js";
export { runMigrate } from "./migrate.js";
export { reportError } from "./output.js";
