import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly payload?: unknown;
}

/**
 * Logger double capturing entries in memory. It subclasses the production
 * {@link StructuredLogger} so pipelines receive the exact same surface, and
 * records every entry whatever the configured level.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false, sink: () => undefined });
  }

  /** Messages logged at {@link level}, in emission order. */
  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  /** Payload of the first entry named {@link message}. */
  payloadOf(message: string): unknown {
    return this.entries.find((entry) => entry.message === message)?.payload;
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}
