import { z } from "zod";
import type { ToolContext } from "./context.js";
import type { CommandResult, FailureResult } from "../types/result.js";
import { failure } from "../types/result.js";
import type { ToolMetadata } from "../types/tool.js";

// ── Argument Errors ────────────────────────────────────────────────

export function missingParam(param: string, hint?: string): FailureResult {
  return failure({
    error: "missing parameter",
    param,
    details: `Required parameter '${param}' is missing${hint ? `. ${hint}` : ""}`,
  });
}

export function invalidParam(param: string, details: string): FailureResult {
  return failure({ error: "invalid parameter", param, details });
}

function fromZodError(err: z.ZodError): FailureResult {
  const [first] = err.issues;
  const param = first && first.path.length > 0 ? first.path.join(".") : "arguments";
  const details = err.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
  return invalidParam(param, details);
}

// ── Shared Schema Pieces ───────────────────────────────────────────

export const repoArgs = {
  owner: z.string().min(1).optional().describe("Repository owner (falls back to GH_REPO_OWNER)"),
  repo: z.string().min(1).optional().describe("Repository name (falls back to GH_REPO_NAME)"),
};

/** Issue/PR number or URL. It is passed positionally, so a leading "-" is refused. */
export function identifier(what: string) {
  return z
    .union([
      z.number().int().positive(),
      z.string().min(1).refine((s) => !s.startsWith("-"), { message: "must not start with '-'" }),
    ])
    .describe(`${what} number or URL`);
}

// ── Parameter Resolution ───────────────────────────────────────────

/** Resolve `owner/repo` from explicit args or the `global` capability; fail without executing if either is absent. */
export function resolveRepo(ctx: ToolContext, owner: string | undefined, repo: string | undefined): string | FailureResult {
  const resolvedOwner = ctx.resolver.string("global", "owner", owner);
  if (!resolvedOwner) return missingParam("owner", "Pass it explicitly or set GH_REPO_OWNER");
  const resolvedRepo = ctx.resolver.string("global", "repo", repo);
  if (!resolvedRepo) return missingParam("repo", "Pass it explicitly or set GH_REPO_NAME");
  return `${resolvedOwner}/${resolvedRepo}`;
}

/**
 * Pick between an inline body and a body file. Both together, or a stdin file ("-"),
 * are rejected; with `required` one of them must be present.
 */
export function bodySource(body: string | undefined, bodyFile: string | undefined, required: boolean): string[] | FailureResult {
  if (body && bodyFile) return invalidParam("body", "body and body_file are mutually exclusive");
  if (body) return [`--body=${body}`];
  if (bodyFile === "-") return invalidParam("body_file", "Reading the body from stdin ('-') is not supported");
  if (bodyFile) return [`--body-file=${bodyFile}`];
  return required ? missingParam("body", "Provide either body or body_file") : [];
}

// ── Argv Builders ──────────────────────────────────────────────────
// Values are always attached as `--flag=value`, so no user value is ever a bare argv
// token that gh (or wantsStructuredOutput) could read as a flag of its own.

export function option(flag: string, value: string | number): string {
  return `${flag}=${value}`;
}

/** `--flag=value`, skipped when the value is absent or empty. */
export function pushOption(argv: string[], flag: string, value: string | number | null | undefined): void {
  if (value === null || value === undefined || value === "") return;
  argv.push(option(flag, value));
}

/** `--flag=a --flag=b` for each non-empty value. */
export function pushRepeated(argv: string[], flag: string, values: readonly string[] | null | undefined): void {
  for (const value of values ?? []) {
    if (value) argv.push(option(flag, value));
  }
}

/** `--flag=a,b`, skipped for an absent or empty list. */
export function pushJoined(argv: string[], flag: string, values: readonly string[] | null | undefined): void {
  const kept = (values ?? []).filter(Boolean);
  if (kept.length > 0) argv.push(option(flag, kept.join(",")));
}

export function pushSwitch(argv: string[], flag: string, on: boolean | null | undefined): void {
  if (on) argv.push(flag);
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool on the context's registry. Raw protocol arguments are validated
 * against the input schema first; a schema failure is returned as "invalid parameter"
 * and the handler is not called.
 */
export function registerTool<Schema extends z.AnyZodObject>(
  ctx: ToolContext,
  metadata: ToolMetadata<Schema>,
  handler: (args: z.infer<Schema>) => Promise<CommandResult>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (raw) => {
      const parsed = metadata.inputSchema.safeParse(raw ?? {});
      if (!parsed.success) return fromZodError(parsed.error);
      return handler(parsed.data);
    },
  });
}
