/**
 * Tests for the batch runner and source file enumeration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { iterateBatch, runBatch } from "../src/batch/runner.js";
import { isSupportedImage, listSourceFiles } from "../src/batch/walker.js";
import { InternalError, IoError, UserError } from "../src/errors.js";
import type { ProgressEvent } from "../src/types.js";
import { makeTempDir, removeTempDir } from "./helpers.js";

describe("batch", () => {
  describe("runBatch", () => {
    it("should keep input order and isolate failures", async () => {
      const worker = async (filePath: string) => {
        if (filePath === "b") {
          throw new UserError("bad file");
        }
        return filePath.toUpperCase();
      };

      const report = await runBatch(["a", "b", "c"], worker, { concurrency: 2 });

      expect(report.succeeded).toBe(2);
      expect(report.failed).toBe(1);
      expect(report.outcomes.map((o) => (o.ok ? o.value : o.error.message))).toEqual(["A", "bad file", "C"]);
    });

    it("should normalise foreign errors", async () => {
      const report = await runBatch(["x"], async () => {
        throw new TypeError("not ours");
      });

      const outcome = report.outcomes[0];
      expect(!outcome.ok && outcome.error).toBeInstanceOf(InternalError);
    });

    it("should never run more than `concurrency` workers at once", async () => {
      let active = 0;
      let peak = 0;
      const worker = async (filePath: string) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return filePath;
      };

      await runBatch(["1", "2", "3", "4", "5"], worker, { concurrency: 2 });

      expect(peak).toBe(2);
    });

    it("should treat a concurrency below one as sequential", async () => {
      const worker = vi.fn(async (filePath: string) => filePath);

      const report = await runBatch(["1", "2"], worker, { concurrency: 0 });

      expect(report.succeeded).toBe(2);
      expect(worker).toHaveBeenCalledTimes(2);
    });

    it("should emit start and completion events", async () => {
      const events: ProgressEvent[] = [];

      await runBatch(
        ["ok", "bad"],
        async (filePath) => {
          if (filePath === "bad") throw new IoError("disk gone");
          return filePath;
        },
        { concurrency: 2, onProgress: (event) => events.push(event) }
      );

      expect(events).toEqual([
        { type: "file_started", path: "ok" },
        { type: "file_started", path: "bad" },
        { type: "file_completed", path: "ok", success: true },
        { type: "file_completed", path: "bad", success: false, error: "disk gone" },
      ]);
    });

    it("should report sizes on successful completions when asked", async () => {
      const events: ProgressEvent[] = [];

      await runBatch(
        ["abc", "bad"],
        async (filePath) => {
          if (filePath === "bad") throw new IoError("disk gone");
          return filePath;
        },
        { onProgress: (event) => events.push(event), sizeOf: (value) => value.length }
      );

      expect(events.filter((event) => event.type === "file_completed")).toEqual([
        { type: "file_completed", path: "abc", success: true, size_bytes: 3 },
        { type: "file_completed", path: "bad", success: false, error: "disk gone" },
      ]);
    });

    it("should handle an empty file list", async () => {
      expect(await runBatch([], async () => 1)).toEqual({ outcomes: [], succeeded: 0, failed: 0 });
    });
  });

  describe("iterateBatch", () => {
    it("should yield lazily so callers can stop early", async () => {
      const worker = vi.fn(async (filePath: string) => filePath);
      const seen: string[] = [];

      for await (const outcome of iterateBatch(["1", "2", "3"], worker)) {
        seen.push(outcome.path);
        if (seen.length === 1) break;
      }

      expect(seen).toEqual(["1"]);
      expect(worker).toHaveBeenCalledTimes(1);
    });
  });

  describe("listSourceFiles", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir();
      await fs.mkdir(path.join(tempDir, "2024", "summer"), { recursive: true });
      await fs.mkdir(path.join(tempDir, ".cache"));
      await fs.writeFile(path.join(tempDir, "b.jpg"), "b");
      await fs.writeFile(path.join(tempDir, "a.png"), "a");
      await fs.writeFile(path.join(tempDir, "a.png.json"), "{}");
      await fs.writeFile(path.join(tempDir, "a.png.json.bak1"), "{}");
      await fs.writeFile(path.join(tempDir, "a.png.json.tmp"), "{}");
      await fs.writeFile(path.join(tempDir, ".hidden.jpg"), "h");
      await fs.writeFile(path.join(tempDir, ".cache", "c.jpg"), "c");
      await fs.writeFile(path.join(tempDir, "2024", "summer", "d.heic"), "d");
      await fs.writeFile(path.join(tempDir, "notes.txt"), "n");
      await fs.writeFile(path.join(tempDir, "E.NEF"), "e");
      await fs.writeFile(path.join(tempDir, "README"), "r");
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it("should list one level of image files, skipping sidecars and hidden files", async () => {
      expect(await listSourceFiles(tempDir, false)).toEqual([
        path.join(tempDir, "E.NEF"),
        path.join(tempDir, "a.png"),
        path.join(tempDir, "b.jpg"),
      ]);
    });

    it("should descend into visible subdirectories when recursive", async () => {
      expect(await listSourceFiles(tempDir, true)).toEqual([
        path.join(tempDir, "2024", "summer", "d.heic"),
        path.join(tempDir, "E.NEF"),
        path.join(tempDir, "a.png"),
        path.join(tempDir, "b.jpg"),
      ]);
    });

    it("should match image extensions regardless of case", () => {
      expect(isSupportedImage("IMG_0001.JPG")).toBe(true);
      expect(isSupportedImage("scan.Tiff")).toBe(true);
      expect(isSupportedImage("IMG_0001.JPG.json")).toBe(false);
      expect(isSupportedImage("IMG_0001.JPG.json.bak1")).toBe(false);
      expect(isSupportedImage("notes.txt")).toBe(false);
      expect(isSupportedImage("jpg")).toBe(false);
    });

    it("should return an explicitly named file whatever its extension", async () => {
      const filePath = path.join(tempDir, "notes.txt");

      expect(await listSourceFiles(filePath, false)).toEqual([filePath]);
    });

    it("should return a single file as is", async () => {
      const filePath = path.join(tempDir, "b.jpg");

      expect(await listSourceFiles(filePath, true)).toEqual([filePath]);
    });

    it("should throw IoError for a missing path", async () => {
      await expect(listSourceFiles(path.join(tempDir, "missing"), false)).rejects.toBeInstanceOf(IoError);
    });
  });
});
