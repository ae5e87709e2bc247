/**
 * Tests for atomic sidecar writes and backup rotation
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { listBackups, rotateBackups } from "../src/persistence/backup-rotation.js";
import { readSidecarBytes, writeSidecar } from "../src/persistence/atomic-write.js";
import { encodeSidecar } from "../src/sidecar/codec.js";
import { backupPath, tempPathFor } from "../src/sidecar/paths.js";
import { makeRecord, makeTempDir, removeTempDir } from "./helpers.js";

function version(n: number) {
  return makeRecord({ producer_version: `0.0.${n}` });
}

describe("persistence", () => {
  let tempDir: string;
  let sidecarPath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    sidecarPath = path.join(tempDir, "IMG_0001.JPG.json");
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  async function read(filePath: string): Promise<string> {
    return fs.readFile(filePath, "utf-8");
  }

  describe("writeSidecar", () => {
    it("should create a sidecar without a backup when none existed", async () => {
      const outcome = await writeSidecar(sidecarPath, version(1), { backup: true });

      expect(outcome).toEqual({ path: sidecarPath, backupPath: null });
      expect(await read(sidecarPath)).toBe(encodeSidecar(version(1)));
      expect(await listBackups(sidecarPath)).toEqual([]);
    });

    it("should leave no temp file behind", async () => {
      await writeSidecar(sidecarPath, version(1), { backup: true });

      expect(await fs.readdir(tempDir)).toEqual(["IMG_0001.JPG.json"]);
    });

    it("should keep the three most recent prior versions over four writes", async () => {
      for (let n = 1; n <= 4; n++) {
        await writeSidecar(sidecarPath, version(n), { backup: true });
      }

      expect(await read(sidecarPath)).toBe(encodeSidecar(version(4)));
      expect(await read(backupPath(sidecarPath, 1))).toBe(encodeSidecar(version(3)));
      expect(await read(backupPath(sidecarPath, 2))).toBe(encodeSidecar(version(2)));
      expect(await read(backupPath(sidecarPath, 3))).toBe(encodeSidecar(version(1)));
    });

    it("should drop the oldest backup on a fifth write", async () => {
      for (let n = 1; n <= 5; n++) {
        await writeSidecar(sidecarPath, version(n), { backup: true });
      }

      expect(await read(backupPath(sidecarPath, 1))).toBe(encodeSidecar(version(4)));
      expect(await read(backupPath(sidecarPath, 3))).toBe(encodeSidecar(version(2)));
      expect(await fs.readdir(tempDir)).toHaveLength(4);
    });

    it("should report the backup written by each call", async () => {
      await writeSidecar(sidecarPath, version(1), { backup: true });
      const outcome = await writeSidecar(sidecarPath, version(2), { backup: true });

      expect(outcome.backupPath).toBe(`${sidecarPath}.bak1`);
    });

    it("should skip backups when disabled", async () => {
      await writeSidecar(sidecarPath, version(1), { backup: false });
      const outcome = await writeSidecar(sidecarPath, version(2), { backup: false });

      expect(outcome.backupPath).toBeNull();
      expect(await read(sidecarPath)).toBe(encodeSidecar(version(2)));
      expect(await listBackups(sidecarPath)).toEqual([]);
    });

    it("should replace a stale temp file from an earlier crash", async () => {
      await fs.writeFile(tempPathFor(sidecarPath), "half-written");

      await writeSidecar(sidecarPath, version(1), { backup: false });

      expect(await read(sidecarPath)).toBe(encodeSidecar(version(1)));
      expect(await fs.readdir(tempDir)).toEqual(["IMG_0001.JPG.json"]);
    });

    it("should fail with IoError when the directory does not exist", async () => {
      const orphan = path.join(tempDir, "missing-dir", "IMG_0002.JPG.json");

      await expect(writeSidecar(orphan, version(1), { backup: true })).rejects.toMatchObject({
        kind: "io",
      });
    });
  });

  describe("rotateBackups", () => {
    it("should do nothing without a sidecar", async () => {
      expect(await rotateBackups(sidecarPath)).toBeNull();
      expect(await listBackups(sidecarPath)).toEqual([]);
    });

    it("should fill a gap instead of shifting past it", async () => {
      await fs.writeFile(sidecarPath, "current");
      await fs.writeFile(backupPath(sidecarPath, 2), "older");

      const bak1 = await rotateBackups(sidecarPath);

      expect(bak1).toBe(backupPath(sidecarPath, 1));
      expect(await read(backupPath(sidecarPath, 1))).toBe("current");
      expect(await read(backupPath(sidecarPath, 2))).toBe("older");
      expect(await listBackups(sidecarPath)).toEqual([
        backupPath(sidecarPath, 1),
        backupPath(sidecarPath, 2),
      ]);
    });

    it("should leave the sidecar itself in place", async () => {
      await fs.writeFile(sidecarPath, "current");

      await rotateBackups(sidecarPath);

      expect(await read(sidecarPath)).toBe("current");
    });
  });

  describe("readSidecarBytes", () => {
    it("should return null for a missing sidecar", async () => {
      expect(await readSidecarBytes(sidecarPath)).toBeNull();
    });

    it("should throw IoError when the path is a directory", async () => {
      await fs.mkdir(sidecarPath);

      await expect(readSidecarBytes(sidecarPath)).rejects.toMatchObject({ kind: "io" });
    });
  });
});
