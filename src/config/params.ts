// Parameter table loader: reads config/params.yaml, applies user overrides from the
// server config, validates every entry and freezes the result. The resolver only ever
// sees the frozen table; nothing mutates it after startup.
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ParamSpec, ParamTable, ParamValue } from "../types/param.js";
import { deepMerge, isPlainObject } from "./merge.js";

const paramValueSchema = z.union([z.string(), z.number().int(), z.boolean(), z.array(z.string())]);

const paramEntrySchema = z
  .object({
    type: z.enum(["string", "integer", "list", "boolean"]),
    env_var: z.string().min(1).nullable().optional(),
    default: paramValueSchema.nullable().optional(),
  })
  .strict()
  .superRefine((entry, ctx) => {
    if (entry.default === undefined || entry.default === null) return;
    if (!matchesType(entry.type, entry.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["default"],
        message: `default ${JSON.stringify(entry.default)} is not a valid ${entry.type}`,
      });
    }
  });

const paramTableSchema = z.record(z.string(), z.record(z.string(), paramEntrySchema));

function matchesType(type: ParamSpec["type"], value: ParamValue): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "list":
      return Array.isArray(value);
  }
}

/** Locate the bundled params.yaml whether running from src/ (ts-jest) or dist/src/ (built). */
export function bundledParamsPath(): string {
  const candidates = [
    join(__dirname, "..", "..", "config", "params.yaml"),
    join(__dirname, "..", "..", "..", "config", "params.yaml"),
  ];
  const found = candidates.find((p) => existsSync(p));
  if (!found) {
    throw new Error(`Bundled parameter table not found (looked in ${candidates.join(", ")})`);
  }
  return found;
}

/** Read the raw (unvalidated) YAML document from disk. */
export function readParamFile(path: string = bundledParamsPath()): unknown {
  return parseYaml(readFileSync(path, "utf-8"));
}

/**
 * Validate a raw table (plus optional per-entry overrides) and freeze it.
 * Throws a ZodError when any entry is malformed; callers decide how to degrade.
 */
export function buildParamTable(raw: unknown, overrides?: unknown): ParamTable {
  const base = isPlainObject(raw) ? raw : {};
  const merged = isPlainObject(overrides) ? deepMerge(base, overrides) : base;
  const parsed = paramTableSchema.parse(merged);

  const table = new Map<string, ReadonlyMap<string, ParamSpec>>();
  for (const [capability, params] of Object.entries(parsed)) {
    const entries = new Map<string, ParamSpec>();
    for (const [name, entry] of Object.entries(params)) {
      const fallback = entry.default ?? null;
      entries.set(name, Object.freeze({
        type: entry.type,
        envVar: entry.env_var ?? null,
        default: Array.isArray(fallback) ? Object.freeze([...fallback]) : fallback,
      }));
    }
    table.set(capability, entries);
  }
  return table;
}
