// Command execution layer: every tool's gh invocation passes through GhExecutor.execute().
// It is the hard boundary between tool code and the gh binary. It gates on the credential,
// spawns exactly once and turns every outcome (including thrown errors) into a CommandResult.
// Changing classification here changes what every registered tool reports to the client.
import type { CommandResult } from "../types/result.js";
import { failure, json, text } from "../types/result.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { ExecFileRunner, errorCode, errorMessage, type CommandRunner, type RunOutcome } from "./runner.js";

/** Checked in order; the first non-empty value is forwarded to gh as GH_TOKEN. */
export const CREDENTIAL_ENV_VARS = ["GITHUB_TOKEN", "GH_TOKEN"] as const;

export const DEFAULT_ERROR_MESSAGE = "GitHub CLI command failed.";

/** What tool wrappers depend on. GhExecutor is the production implementation. */
export interface CommandExecutor {
  execute(args: readonly string[]): Promise<CommandResult>;
}

export interface GhExecutorOptions {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  binary?: string;
  /** 0 waits forever. */
  timeoutMs?: number;
  maxBufferBytes?: number;
  logger?: Logger;
}

/** True when the argv asks gh for machine-readable output (`--json …` or `--format json`). */
export function wantsStructuredOutput(args: readonly string[]): boolean {
  return args.some((arg, i) =>
    arg === "--json" ||
    arg.startsWith("--json=") ||
    arg === "--format=json" ||
    (arg === "--format" && args[i + 1] === "json"),
  );
}

export class GhExecutor implements CommandExecutor {
  private readonly runner: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly maxBufferBytes: number;
  private readonly log: Logger;

  constructor(options: GhExecutorOptions = {}) {
    this.runner = options.runner ?? new ExecFileRunner();
    this.env = options.env ?? process.env;
    this.binary = options.binary ?? "gh";
    this.timeoutMs = options.timeoutMs ?? 120_000;
    // 10MB ceiling: large enough for long item lists, bounded against runaway output.
    this.maxBufferBytes = options.maxBufferBytes ?? 10 * 1024 * 1024;
    this.log = options.logger ?? defaultLogger;
  }

  /** The credential gh would run with, or null when none is configured. */
  credential(): string | null {
    for (const name of CREDENTIAL_ENV_VARS) {
      const value = this.env[name];
      if (value) return value;
    }
    return null;
  }

  async execute(args: readonly string[]): Promise<CommandResult> {
    const token = this.credential();
    if (token === null) {
      this.log.warn({ args }, "No GitHub credential in environment; command not run");
      return failure({
        error: "missing credential",
        details: `Set ${CREDENTIAL_ENV_VARS.join(" or ")} in the server environment.`,
      });
    }

    const command = [this.binary, ...args].join(" ");
    this.log.debug({ command }, "Running gh command");

    let outcome: RunOutcome;
    try {
      outcome = await this.runner.run(this.binary, args, {
        env: { ...this.env, GH_TOKEN: token, NO_COLOR: "1" },
        timeoutMs: this.timeoutMs,
        maxBufferBytes: this.maxBufferBytes,
      });
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        this.log.error({ binary: this.binary }, "GitHub CLI binary not found");
        return failure({
          error: "tool not found",
          details: `'${this.binary}' command not found. Make sure the GitHub CLI is installed and in your PATH.`,
        });
      }
      const message = errorMessage(err);
      this.log.error({ command, error: message }, "Unexpected error while running gh");
      return failure({ error: "unexpected execution error", details: message });
    }

    const stdout = outcome.stdout.trim();
    const stderr = outcome.stderr.trim();

    if (outcome.timedOut) {
      this.log.error({ command, timeoutMs: this.timeoutMs }, "gh command timed out");
      return failure({
        error: "execution error",
        details: `Command did not finish within ${this.timeoutMs / 1000}s and was terminated.`,
        exit_code: null,
        stderr,
        stdout,
        timed_out: true,
      });
    }

    if (outcome.exitCode !== 0) {
      this.log.warn({ command, exitCode: outcome.exitCode, stderr }, "gh command failed");
      return failure({
        error: "execution error",
        details: stderr || stdout || DEFAULT_ERROR_MESSAGE,
        exit_code: outcome.exitCode,
        stderr,
        stdout,
      });
    }

    this.log.debug({ command, durationMs: outcome.durationMs }, "gh command succeeded");

    if (!wantsStructuredOutput(args)) return text(stdout);

    try {
      const data: unknown = JSON.parse(stdout);
      return json(data);
    } catch {
      this.log.warn({ command, raw: outcome.stdout }, "Expected JSON output but received non-JSON text");
      return failure({
        error: "unexpected output shape",
        details: "Expected JSON output but received non-JSON text",
        raw: outcome.stdout,
      });
    }
  }
}
