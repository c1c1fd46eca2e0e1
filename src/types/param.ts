/** Declared type of an optional tool parameter; governs how its env string is decoded. */
export type ParamType = "string" | "integer" | "list" | "boolean";

/** Any value a parameter can take once resolved. */
export type ParamValue = string | number | boolean | readonly string[];

/** Static description of one optional parameter (capability + name is the key). */
export interface ParamSpec {
  readonly type: ParamType;
  readonly envVar: string | null;
  readonly default: ParamValue | null;
}

/** capability -> parameter name -> spec. Built once at startup, never mutated. */
export type ParamTable = ReadonlyMap<string, ReadonlyMap<string, ParamSpec>>;
