import { ChildProcess, type SpawnOptions } from "node:child_process";
import { PassThrough } from "node:stream";

import type { SpawnImplementation } from "../../src/gateways/childProcess.js";

/** What a scripted command "prints" and how it exits. */
export interface ScriptedOutcome {
  readonly status?: number | null;
  readonly stdout?: string;
  readonly stderr?: string;
  /** Emitted as the child `error` event instead of a close (e.g. ENOENT). */
  readonly error?: Error;
  /** Never exit; only a kill ends the child. */
  readonly hang?: boolean;
}

export interface RecordedSpawn {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: SpawnOptions;
  /** Everything written to the child's stdin, available once it ended. */
  stdin: string;
}

/**
 * Child process double: stdio are in-memory streams and nothing is executed.
 * The outcome is produced once the caller closes stdin.
 */
export class FakeChildProcess extends ChildProcess {
  override stdin = new PassThrough();
  override stdout = new PassThrough();
  override stderr = new PassThrough();

  override kill(signal?: NodeJS.Signals | number): boolean {
    this.emit("close", null, typeof signal === "string" ? signal : "SIGTERM");
    return true;
  }
}

export type Responder = (call: RecordedSpawn) => ScriptedOutcome;

/**
 * Records every spawn and answers with {@link respond}. Inject
 * {@link FakeSpawn.spawnImpl} wherever a {@link SpawnImplementation} is accepted.
 */
export class FakeSpawn {
  public readonly calls: RecordedSpawn[] = [];

  constructor(private readonly respond: Responder = () => ({ status: 0 })) {}

  readonly spawnImpl: SpawnImplementation = (command, args, options) => {
    const call: RecordedSpawn = { command, args: [...args], options, stdin: "" };
    this.calls.push(call);

    const child = new FakeChildProcess();
    const chunks: string[] = [];
    child.stdin.on("data", (chunk: Buffer | string) => {
      chunks.push(chunk.toString());
    });
    child.stdin.on("finish", () => {
      call.stdin = chunks.join("");
      const outcome = this.respond(call);
      if (outcome.hang) {
        return;
      }
      setImmediate(() => {
        if (outcome.error !== undefined) {
          child.emit("error", outcome.error);
          return;
        }
        let open = 2;
        const ended = () => {
          open -= 1;
          if (open === 0) {
            child.emit("close", outcome.status ?? 0, null);
          }
        };
        child.stdout.once("end", ended);
        child.stderr.once("end", ended);
        child.stdout.end(outcome.stdout ?? "");
        child.stderr.end(outcome.stderr ?? "");
      });
    });
    return child;
  };

  /** Commands spawned so far, as `command arg...` strings. */
  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }
}
