/**
 * Namespaced debug logging on stderr, off unless DEBUG selects it
 *
 *   DEBUG=sidecar-keeper:* sidecar-keeper verify ~/Photos
 *   DEBUG=sidecar-keeper:persist sidecar-keeper migrate ~/Photos --to 1.1.0
 *   DEBUG=sidecar-keeper:verify,sidecar-keeper:fingerprint sidecar-keeper verify .
 */

export type DebugNamespace =
  | "fingerprint"
  | "codec"
  | "persist"
  | "verify"
  | "migrate"
  | "scan"
  | "batch"
  | "config";

export interface DebugLogger {
  (message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Logs the message, then the error's message and stack on their own lines */
  error(message: string, error?: unknown): void;
}

const PREFIX = "sidecar-keeper";

// DEBUG is read on every call so tests and long runs can flip it
function isEnabled(namespace: DebugNamespace): boolean {
  const selected = (process.env.DEBUG ?? "")
    .split(",")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);

  return selected.some(
    (pattern) => pattern === "*" || pattern === `${PREFIX}:*` || pattern === `${PREFIX}:${namespace}`
  );
}

export function createDebug(namespace: DebugNamespace): DebugLogger {
  const tag = `[${PREFIX}:${namespace}]`;
  const line = (text: string) => `${new Date().toISOString()} ${tag} ${text}`;

  const log = (message: string, ...args: unknown[]) => {
    if (isEnabled(namespace)) {
      console.error(line(message), ...args);
    }
  };

  const warn = (message: string, ...args: unknown[]) => {
    if (isEnabled(namespace)) {
      console.error(line(`WARN: ${message}`), ...args);
    }
  };

  const error = (message: string, cause?: unknown) => {
    if (!isEnabled(namespace)) return;

    const details =
      cause instanceof Error
        ? [cause.message, ...(cause.stack ? [cause.stack] : [])]
        : cause === undefined
          ? []
          : [String(cause)];
    console.error(line(`ERROR: ${message}`));
    for (const detail of details) {
      console.error(line(`  ${detail}`));
    }
  };

  return Object.assign(log, { warn, error });
}

export const debugFingerprint = createDebug("fingerprint");
export const debugCodec = createDebug("codec");
export const debugPersist = createDebug("persist");
export const debugVerify = createDebug("verify");
export const debugMigrate = createDebug("migrate");
export const debugScan = createDebug("scan");
export const debugBatch = createDebug("batch");
export const debugConfig = createDebug("config");
