import type { CommandExecutor } from "../execution/executor.js";
import type { ParamResolver } from "../params/resolver.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared tool context: the glue between the core and the tool modules.
 * Created once at startup, passed to every register*Tools() function.
 */
export interface ToolContext {
  readonly resolver: ParamResolver;
  readonly executor: CommandExecutor;
  readonly registry: ToolRegistry;
}
