// Config loader: reads ~/.config/gh-project-mcp/config.yaml and deep-merges it with defaults.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// The merged document is validated with zod; an invalid file falls back to defaults.
// `parameters` is handed to buildParamTable() unvalidated; that step owns its schema.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../logger.js";
import { deepMerge, isPlainObject } from "./merge.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "gh-project-mcp");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const serverConfigSchema = z.object({
  cli: z.object({
    binary: z.string().min(1),
    timeout_seconds: z.number().int().min(0),
    max_output_mb: z.number().positive(),
  }),
  parameters: z.record(z.string(), z.unknown()),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export const DEFAULT_CONFIG: ServerConfig = {
  cli: { binary: "gh", timeout_seconds: 120, max_output_mb: 10 },
  parameters: {},
};

const DEFAULT_CONFIG_YAML = `# gh-project-mcp configuration
# Generated automatically on first run. All values shown are defaults.

cli:
  # Path or name of the GitHub CLI binary
  binary: gh
  # Kill gh if it has not exited after this many seconds (0 = wait forever)
  timeout_seconds: 120
  # Upper bound on captured stdout/stderr, in megabytes
  max_output_mb: 10

# Override or add optional tool parameters, e.g.
# parameters:
#   issue:
#     limit: { default: 50 }
#   pull_request:
#     reviewers: { type: list, env_var: MY_REVIEWERS, default: [octocat] }
parameters: {}
`;

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  try {
    const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
    const merged = deepMerge(DEFAULT_CONFIG, isPlainObject(parsed) ? parsed : {});
    const config = serverConfigSchema.parse(merged);
    return { config, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to load config, using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }
}
