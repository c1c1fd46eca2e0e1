#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { z } from "zod";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { buildParamTable, readParamFile } from "./config/params.js";
import { ParamResolver } from "./params/resolver.js";
import { GhExecutor, CREDENTIAL_ENV_VARS } from "./execution/executor.js";
import { createToolRegistry } from "./tools/index.js";
import { toCallToolResult, thrownToCallToolResult } from "./tools/response.js";
import type { ParamTable } from "./types/param.js";

const SERVER_NAME = "gh-project-mcp";
const SERVER_VERSION = "0.1.0";

function loadParamTable(overrides: unknown): ParamTable {
  const raw = readParamFile();
  try {
    return buildParamTable(raw, overrides);
  } catch (err) {
    logger.error({ error: err }, "Parameter overrides are invalid; using the bundled table only");
    return buildParamTable(raw);
  }
}

async function main(): Promise<void> {
  logger.info("Starting gh-project-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.GH_PROJECT_MCP_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Build parameter table ────────────────────────────
  const table = loadParamTable(config.parameters);
  const resolver = new ParamResolver(table);

  // ── Phase 3: Create executor ──────────────────────────────────
  const executor = new GhExecutor({
    binary: config.cli.binary,
    timeoutMs: config.cli.timeout_seconds * 1000,
    maxBufferBytes: Math.round(config.cli.max_output_mb * 1024 * 1024),
  });
  if (executor.credential() === null) {
    logger.warn(`No ${CREDENTIAL_ENV_VARS.join(" or ")} set; every tool call will fail until one is provided`);
  }

  // ── Phase 4: Register all tool modules ────────────────────────
  const registry = createToolRegistry(resolver, executor);
  logger.info({ toolCount: registry.size, ...registry.summary() }, "All tool modules registered");

  // ── Phase 5: Create MCP server ────────────────────────────────
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  // ── Phase 6: Register tools on MCP server ─────────────────────
  for (const [name, tool] of registry.getAll()) {
    const meta = tool.metadata;
    const inputShape: z.ZodRawShape = meta.inputSchema.shape;

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? false,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? true,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          return toCallToolResult(await tool.execute(args));
        } catch (err) {
          logger.error({ tool: name, error: err }, "Tool execution error");
          return thrownToCallToolResult(err);
        }
      },
    );
  }

  // ── Phase 7: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size }, "gh-project-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
