/**
 * Tests for CLI command handlers and output helpers
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { BatchReport } from "../src/batch/runner.js";
import { runMigrate } from "../src/commands/migrate.js";
import { failureExitCode, reportError, toBatchData, wantsJson } from "../src/commands/output.js";
import { runScan } from "../src/commands/scan.js";
import { runVerify } from "../src/commands/verify.js";
import { IoError, UserError, ValidationError } from "../src/errors.js";
import type { Sidecar } from "../src/types.js";
import { makeTempDir, removeTempDir, writeTrackedFile } from "./helpers.js";

function toLegacy(record: Sidecar): Sidecar {
  return {
    ...record,
    schema_version: "1.0.0",
    pipeline_signature: { ...record.pipeline_signature, schema_version: "1.0.0" },
  };
}

describe("commands", () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
    await removeTempDir(tempDir);
  });

  function printedJson(): unknown {
    expect(logSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(logSpy.mock.calls[0][0]));
  }

  describe("output helpers", () => {
    const report: BatchReport<string> = {
      outcomes: [
        { path: "a.jpg", ok: true, value: "done" },
        { path: "b.jpg", ok: false, error: new UserError("bad input") },
        { path: "c.jpg", ok: false, error: new IoError("disk gone") },
      ],
      succeeded: 1,
      failed: 2,
    };

    it("should use JSON when asked or when stdout is piped", () => {
      expect(wantsJson(true, true)).toBe(true);
      expect(wantsJson(false, false)).toBe(true);
      expect(wantsJson(false, true)).toBe(false);
    });

    it("should split results from per-file errors", () => {
      expect(toBatchData(report)).toEqual({
        results: ["done"],
        errors: [
          { path: "b.jpg", kind: "user", message: "bad input" },
          { path: "c.jpg", kind: "io", message: "disk gone" },
        ],
        succeeded: 1,
        failed: 2,
      });
    });

    it("should exit with the highest failing code", () => {
      expect(failureExitCode(report)).toBe(2);
      expect(failureExitCode({ outcomes: [], succeeded: 0, failed: 0 })).toBe(0);
    });

    it("should print errors as kind and message on stderr", () => {
      reportError(new ValidationError("sidecar is corrupt"));

      expect(errorSpy).toHaveBeenCalledWith('{"kind":"validation","message":"sidecar is corrupt"}');
      expect(process.exitCode).toBe(3);
    });

    it("should report unexpected errors as internal", () => {
      reportError(new TypeError("boom"));

      expect(errorSpy).toHaveBeenCalledWith('{"kind":"internal","message":"boom"}');
      expect(process.exitCode).toBe(4);
    });
  });

  describe("runVerify", () => {
    it("should print a timing envelope and exit 0 when everything is ok", async () => {
      const { filePath } = await writeTrackedFile(tempDir, "a.jpg", "a");

      await runVerify(tempDir, { recursive: false, fix: false, strict: false, json: true });

      expect(printedJson()).toMatchObject({
        data: {
          results: [{ path: filePath, status: "ok", reasons: [], suggested_action: "noop" }],
          errors: [],
          succeeded: 1,
          failed: 0,
          fixed: [],
        },
      });
      expect(process.exitCode).toBe(0);
    });

    it("should exit 3 when a sidecar is missing", async () => {
      await fs.writeFile(path.join(tempDir, "a.jpg"), "a");

      await runVerify(tempDir, { recursive: false, fix: false, strict: false, json: true });

      expect(process.exitCode).toBe(3);
    });

    it("should fail on informational reasons only under strict", async () => {
      const { filePath } = await writeTrackedFile(tempDir, "a.jpg", "a");
      const later = new Date("2030-01-01T00:00:00.000Z");
      await fs.utimes(filePath, later, later);

      await runVerify(tempDir, { recursive: false, fix: false, strict: false, json: true });
      expect(process.exitCode).toBe(0);

      logSpy.mockClear();
      await runVerify(tempDir, { recursive: false, fix: false, strict: true, json: true });
      expect(process.exitCode).toBe(3);
    });

    it("should fix touched files and then pass strict mode", async () => {
      const { filePath } = await writeTrackedFile(tempDir, "a.jpg", "a");
      const later = new Date("2030-01-01T00:00:00.000Z");
      await fs.utimes(filePath, later, later);

      await runVerify(tempDir, { recursive: false, fix: true, strict: true, json: true });

      expect(printedJson()).toMatchObject({ data: { fixed: [filePath] } });
      expect(process.exitCode).toBe(0);
    });

    it("should record a failed fix as that file's error and fix the others", async () => {
      const a = await writeTrackedFile(tempDir, "a.jpg", "a");
      const b = await writeTrackedFile(tempDir, "b.jpg", "b");
      const later = new Date("2030-01-01T00:00:00.000Z");
      await fs.utimes(a.filePath, later, later);
      await fs.utimes(b.filePath, later, later);
      await fs.mkdir(`${a.sidecarPath}.tmp`);

      await runVerify(tempDir, { recursive: false, fix: true, strict: false, json: true });

      expect(printedJson()).toMatchObject({
        data: {
          results: [{ path: b.filePath, status: "ok" }],
          errors: [{ path: a.filePath, kind: "io" }],
          succeeded: 1,
          failed: 1,
          fixed: [b.filePath],
        },
      });
      expect(process.exitCode).toBe(2);
    });

    it("should apply pipeline signature overrides", async () => {
      await writeTrackedFile(tempDir, "a.jpg", "a");

      await runVerify(tempDir, {
        recursive: false,
        fix: false,
        strict: false,
        json: true,
        pipelineSignature: '{"schema_version":"1.0.0"}',
      });

      expect(printedJson()).toMatchObject({
        data: { results: [{ status: "stale", reasons: ["schema_version_mismatch"] }] },
      });
      expect(process.exitCode).toBe(3);
    });

    it("should reject malformed overrides", async () => {
      await expect(
        runVerify(tempDir, { recursive: false, fix: false, strict: false, json: true, pipelineSignature: "{" })
      ).rejects.toBeInstanceOf(UserError);
    });
  });

  describe("runMigrate", () => {
    it("should migrate and report per-file results", async () => {
      const { filePath } = await writeTrackedFile(tempDir, "a.jpg", "a", toLegacy);

      await runMigrate(tempDir, { to: "1.1.0", recursive: false, dryRun: false, backup: true, json: true });

      expect(printedJson()).toMatchObject({
        data: {
          results: [{ path: filePath, from: "1.0.0", to: "1.1.0", migrated: true, dry_run: false }],
          failed: 0,
        },
      });
      expect(process.exitCode).toBe(0);
    });

    it("should exit 3 when a sidecar is unusable", async () => {
      await fs.writeFile(path.join(tempDir, "a.jpg"), "a");

      await runMigrate(tempDir, { to: "1.1.0", recursive: false, dryRun: false, backup: true, json: true });

      expect(printedJson()).toMatchObject({ data: { errors: [{ kind: "validation" }], failed: 1 } });
      expect(process.exitCode).toBe(3);
    });

    it("should reject an unknown migration pair", async () => {
      await expect(
        runMigrate(tempDir, { from: "1.0.0", to: "5.0.0", recursive: false, dryRun: false, backup: true, json: true })
      ).rejects.toBeInstanceOf(UserError);
    });
  });

  describe("runScan", () => {
    it("should report what a dry run would write", async () => {
      const filePath = path.join(tempDir, "a.jpg");
      await fs.writeFile(filePath, "a");

      await runScan(tempDir, { recursive: false, dryRun: true, backup: true, json: true });

      expect(printedJson()).toMatchObject({
        data: { results: [{ path: filePath, written: false, dry_run: true }], failed: 0 },
      });
      expect(await fs.readdir(tempDir)).toEqual(["a.jpg"]);
      expect(process.exitCode).toBe(0);
    });
  });
});
