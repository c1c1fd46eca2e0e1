import type { z } from "zod";
import type { CommandResult } from "./result.js";

/** Capability group a tool belongs to; also the parameter-table section it resolves from. */
export type Capability = "issue" | "pull_request" | "project";

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata<Schema extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  readonly capability: Capability;
  readonly inputSchema: Schema;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A registered tool. `execute` validates raw protocol arguments before running the handler. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: unknown) => Promise<CommandResult>;
}
