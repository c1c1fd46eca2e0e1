import type { ParamSpec, ParamTable, ParamType, ParamValue } from "../types/param.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

const TRUTHY = new Set(["true", "1", "yes", "y"]);
const FALSY = new Set(["false", "0", "no", "n"]);
const INTEGER = /^[+-]?\d+$/;

type Coercion = { ok: true; value: ParamValue } | { ok: false; reason: string };

/** Decode an environment string according to the parameter's declared type. */
export function coerceEnvValue(type: ParamType, raw: string): Coercion {
  switch (type) {
    case "string":
      return { ok: true, value: raw };
    case "list":
      return { ok: true, value: raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0) };
    case "integer": {
      const trimmed = raw.trim();
      if (!INTEGER.test(trimmed)) return { ok: false, reason: "not a base-10 integer" };
      const value = Number.parseInt(trimmed, 10);
      if (!Number.isSafeInteger(value)) return { ok: false, reason: "integer out of range" };
      return { ok: true, value };
    }
    case "boolean": {
      const token = raw.trim().toLowerCase();
      if (TRUTHY.has(token)) return { ok: true, value: true };
      if (FALSY.has(token)) return { ok: true, value: false };
      return { ok: false, reason: `expected one of ${[...TRUTHY, ...FALSY].join(", ")}` };
    }
  }
}

export interface ResolverOptions {
  /** Environment to read; defaults to process.env. Never written to. */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Resolves optional tool parameters by precedence:
 * explicit value → environment variable → configured default.
 *
 * `null`/`undefined` mean "not provided"; `""` and `[]` are explicit values and win.
 * Unknown parameters and undecodable env values degrade (to null / the default) with
 * a warning instead of failing the call.
 */
export class ParamResolver {
  private readonly env: NodeJS.ProcessEnv;
  private readonly log: Logger;

  constructor(private readonly table: ParamTable, options: ResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.log = options.logger ?? defaultLogger;
  }

  resolve(capability: string, name: string, explicit?: ParamValue | null): ParamValue | null {
    if (explicit !== undefined && explicit !== null) return explicit;

    const spec = this.lookup(capability, name);
    if (!spec) {
      this.log.warn({ capability, param: name }, "No parameter spec configured; resolving to null");
      return null;
    }

    if (spec.envVar !== null) {
      const raw = this.env[spec.envVar];
      if (raw !== undefined) {
        const decoded = coerceEnvValue(spec.type, raw);
        if (decoded.ok) return decoded.value;
        this.log.warn(
          { capability, param: name, envVar: spec.envVar, value: raw, reason: decoded.reason },
          `Could not decode ${spec.envVar} as ${spec.type}; using configured default`,
        );
      }
    }

    return spec.default;
  }

  string(capability: string, name: string, explicit?: string | null): string | null {
    const value = this.resolve(capability, name, explicit);
    if (value === null || typeof value === "string") return value;
    return this.mismatch(capability, name, "string", value);
  }

  integer(capability: string, name: string, explicit?: number | null): number | null {
    const value = this.resolve(capability, name, explicit);
    if (value === null || typeof value === "number") return value;
    return this.mismatch(capability, name, "integer", value);
  }

  list(capability: string, name: string, explicit?: readonly string[] | null): readonly string[] | null {
    const value = this.resolve(capability, name, explicit);
    if (value === null || Array.isArray(value)) return value;
    return this.mismatch(capability, name, "list", value);
  }

  boolean(capability: string, name: string, explicit?: boolean | null): boolean | null {
    const value = this.resolve(capability, name, explicit);
    if (value === null || typeof value === "boolean") return value;
    return this.mismatch(capability, name, "boolean", value);
  }

  /** Read-only view of a spec entry, mostly for diagnostics and tests. */
  lookup(capability: string, name: string): ParamSpec | undefined {
    return this.table.get(capability)?.get(name);
  }

  private mismatch(capability: string, name: string, expected: ParamType, value: ParamValue): null {
    this.log.warn(
      { capability, param: name, expected, actual: Array.isArray(value) ? "list" : typeof value },
      "Resolved parameter has the wrong type for this tool; ignoring it",
    );
    return null;
  }
}
