// Process runner: the only place a child process is spawned. GhExecutor talks to the
// CommandRunner interface so tests can substitute an in-process fake.
import { execFile } from "node:child_process";
import { types } from "node:util";

export interface RunOptions {
  readonly env: NodeJS.ProcessEnv;
  /** 0 disables the timeout. */
  readonly timeoutMs: number;
  readonly maxBufferBytes: number;
}

/** Captured outcome of a process that was spawned and ran to completion (or was killed). */
export interface RunOutcome {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

/**
 * Runs a binary to completion. Resolves once the process has exited; rejects only
 * when it could not be spawned or its output could not be captured.
 */
export interface CommandRunner {
  run(file: string, args: readonly string[], options: RunOptions): Promise<RunOutcome>;
}

// Errors raised by Node can come from another realm (vm contexts, Jest's environment),
// where `instanceof Error` is false. Both helpers read the shape instead.

/** Extract `err.code` from a spawn/exec error without trusting its shape. */
export function errorCode(err: unknown): string | number | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    if (typeof code === "string" || typeof code === "number") return code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (types.isNativeError(err)) return err.message;
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

/** Runner backed by child_process.execFile. Never uses a shell. */
export class ExecFileRunner implements CommandRunner {
  run(file: string, args: readonly string[], options: RunOptions): Promise<RunOutcome> {
    const start = performance.now();

    return new Promise<RunOutcome>((resolve, reject) => {
      execFile(
        file,
        args,
        {
          env: options.env,
          timeout: options.timeoutMs,
          maxBuffer: options.maxBufferBytes,
          encoding: "utf8",
          shell: false,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0, timedOut: false, durationMs });
            return;
          }
          const code = errorCode(error);
          if (typeof code === "number") {
            resolve({ stdout, stderr, exitCode: code, timedOut: false, durationMs });
            return;
          }
          // Killed by our own timeout: no exit code, terminated by signal.
          if (error.killed === true && code === undefined) {
            resolve({ stdout, stderr, exitCode: null, timedOut: options.timeoutMs > 0, durationMs });
            return;
          }
          reject(error);
        },
      );
    });
  }
}
