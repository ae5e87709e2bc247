/**
 * Terminal progress for batch runs
 * Drawn on stderr so that stdout stays clean for results
 */
import chalk from "chalk";

import type { ProgressEvent, ProgressListener } from "./types.js";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/** 1536 -> "1.5 KB" */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[0]}` : `${value.toFixed(1)} ${units[unit]}`;
}

/** The part of a terminal stream the progress line needs */
export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

/**
 * Check if progress can be redrawn in place
 */
export function isInteractive(stream: ProgressStream = process.stderr): boolean {
  return stream.isTTY === true;
}

/**
 * Single-line counter of processed and failed files
 */
export class BatchProgress {
  private readonly label: string;
  private readonly stream: ProgressStream;
  private readonly startTime = Date.now();
  private frameIndex = 0;
  private done = 0;
  private failed = 0;
  private bytes = 0;

  constructor(label: string, stream: ProgressStream = process.stderr) {
    this.label = label;
    this.stream = stream;
  }

  /** Listener to hand to the batch runner */
  readonly listener: ProgressListener = (event: ProgressEvent) => {
    if (event.type === "file_completed") {
      this.done++;
      if (!event.success) {
        this.failed++;
      }
      this.bytes += event.size_bytes ?? 0;
    }
    this.render();
  };

  private getElapsedTime(): string {
    const elapsed = Math.floor((Date.now() - this.startTime) / 1000);
    if (elapsed < 60) {
      return `${elapsed}s`;
    }
    return `${Math.floor(elapsed / 60)}m ${elapsed % 60}s`;
  }

  private render(): void {
    if (!isInteractive(this.stream)) return;

    const frame = SPINNER_FRAMES[this.frameIndex];
    this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length;
    const failures = this.failed > 0 ? chalk.red(` ${this.failed} failed`) : "";
    const size = this.bytes > 0 ? `, ${formatBytes(this.bytes)}` : "";
    this.stream.write(
      `\r${chalk.cyan(frame)} ${this.label} ${this.done} file(s)${size}${failures} ${chalk.gray(`(${this.getElapsedTime()})`)}`
    );
  }

  /**
   * Clear the progress line
   */
  stop(): void {
    if (isInteractive(this.stream)) {
      this.stream.write("\r" + " ".repeat(80) + "\r");
    }
  }
}
