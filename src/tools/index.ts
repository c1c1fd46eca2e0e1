import type { CommandExecutor } from "../execution/executor.js";
import type { ParamResolver } from "../params/resolver.js";
import type { ToolContext } from "./context.js";
import { ToolRegistry } from "./registry.js";
import { registerIssueTools } from "./issues/index.js";
import { registerPullRequestTools } from "./pull-requests/index.js";
import { registerProjectTools } from "./projects/index.js";

/** Build the registry with every tool module wired to the given resolver and executor. */
export function createToolRegistry(resolver: ParamResolver, executor: CommandExecutor): ToolRegistry {
  const registry = new ToolRegistry();
  const ctx: ToolContext = { resolver, executor, registry };
  registerIssueTools(ctx);
  registerPullRequestTools(ctx);
  registerProjectTools(ctx);
  return registry;
}
