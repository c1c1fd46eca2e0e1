import type { Capability, RegisteredTool } from "../types/tool.js";

/**
 * Every gh tool the server exposes, keyed by tool name and grouped by capability.
 * The MCP server reads from this to populate tools/list and dispatch tools/call.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /** Tool names are the protocol surface, so a second registration under one name is a wiring bug. */
  register(tool: RegisteredTool): void {
    const { name, capability } = tool.metadata;
    const existing = this.tools.get(name);
    if (existing) {
      throw new Error(`Tool '${name}' (${capability}) is already registered by the ${existing.metadata.capability} tools`);
    }
    this.tools.set(name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  getAll(): ReadonlyMap<string, RegisteredTool> {
    return this.tools;
  }

  /** Sorted tool names, optionally limited to one capability. */
  names(capability?: Capability): string[] {
    return [...this.tools.values()]
      .filter((t) => capability === undefined || t.metadata.capability === capability)
      .map((t) => t.metadata.name)
      .sort();
  }

  /** Tool count per capability, plus how many of them are read-only. Logged at startup. */
  summary(): Record<Capability, number> & { readOnly: number } {
    const counts = { issue: 0, pull_request: 0, project: 0, readOnly: 0 };
    for (const { metadata } of this.tools.values()) {
      counts[metadata.capability] += 1;
      if (metadata.annotations?.readOnlyHint) counts.readOnly += 1;
    }
    return counts;
  }

  get size(): number {
    return this.tools.size;
  }
}
