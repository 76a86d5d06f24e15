import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { hasErrnoCode } from "./nodePrimitives.js";

const REDACTED = "[REDACTED]";

const REDACT_ON = new Set(["on", "true", "yes", "1"]);
const REDACT_OFF = new Set(["off", "false", "no", "0"]);

/** Payload keys always masked once redaction is on. */
const SENSITIVE_KEYS = new Set(["token", "password", "secret", "authorization", "license_key"]);

/** Default size of the mirrored log file before it is rotated. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/** Default number of files kept by rotation, the active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface RedactionDirectives {
  readonly enabled: boolean;
  readonly tokens: readonly string[];
}

/**
 * Reads `MRIQ_LOG_REDACT`: a comma-separated list of switches (`on`, `off`)
 * and literal values to mask, e.g. `on,test-secret`. Listing a value without
 * a switch turns redaction on.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let enabled: boolean | undefined;
  const tokens = new Set<string>();
  for (const directive of (raw ?? "").split(",").map((value) => value.trim())) {
    const lower = directive.toLowerCase();
    if (directive.length === 0) {
      continue;
    } else if (REDACT_OFF.has(lower)) {
      enabled = false;
    } else if (REDACT_ON.has(lower)) {
      enabled = true;
    } else {
      tokens.add(directive);
    }
  }
  return { enabled: enabled ?? tokens.size > 0, tokens: [...tokens] };
}

export interface LoggerOptions {
  /** File mirroring every emitted line; `null` disables the mirror. */
  readonly logFile?: string | null;
  /** Minimum level emitted (`warn` by default). */
  readonly level?: LogLevel;
  readonly maxFileSizeBytes?: number;
  readonly maxFileCount?: number;
  /** Literal values masked in payload strings, on top of `MRIQ_LOG_REDACT`. */
  readonly redactSecrets?: readonly string[];
  /** Overrides the switch read from `MRIQ_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Destination of the JSON lines (stdout by default). */
  readonly sink?: (line: string) => void;
}

/**
 * JSON-lines logger shared by both pipelines. Lines go to {@link LoggerOptions.sink}
 * and, when a log file is configured, are appended to it in emission order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly secrets: readonly string[];
  private readonly redactionEnabled: boolean;
  private readonly sink: (line: string) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env.MRIQ_LOG_REDACT);
    this.logFile = options.logFile ?? null;
    this.minLevel = options.level ?? "warn";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.secrets = [...new Set([...directives.tokens, ...(options.redactSecrets ?? [])])].filter(
      (secret) => secret.length > 0,
    );
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink ?? ((line) => process.stdout.write(line));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Resolves once every queued file write landed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) {
      entry.payload = this.redactionEnabled ? this.redact(payload) : payload;
    }
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);

    const logFile = this.logFile;
    if (logFile === null) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.logDirectoryReady) {
          await mkdir(dirname(logFile), { recursive: true });
          this.logDirectoryReady = true;
        }
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        // The mirror is best effort; report on stderr and retry the directory next time.
        this.logDirectoryReady = false;
        process.stderr.write(
          `${JSON.stringify({
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { file: logFile, reason: error instanceof Error ? error.message : String(error) },
          })}\n`,
        );
      }
    });
  }

  /** Shifts `<file>` to `<file>.1`, `<file>.1` to `<file>.2`, and so on. */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let size: number;
    try {
      size = (await stat(logFile)).size;
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }
    if (size + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 0; index -= 1) {
      const source = index === 0 ? logFile : `${logFile}.${index}`;
      try {
        await rename(source, `${logFile}.${index + 1}`);
      } catch (error) {
        if (!hasErrnoCode(error, "ENOENT")) {
          throw error;
        }
      }
    }
  }

  private redact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.secrets.reduce((text, secret) => text.split(secret).join(REDACTED), value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value !== null && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [
          key,
          SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : this.redact(entry),
        ]),
      );
    }
    return value;
  }
}
