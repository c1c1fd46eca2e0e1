import { z } from "zod";
import type { ToolContext } from "../context.js";
import type { FailureResult } from "../../types/result.js";
import { registerTool, missingParam, invalidParam, option, pushOption, pushSwitch } from "../helpers.js";

// Project commands are not repository-scoped: they take a project number and an owner
// (user or organization login, "@me" for the authenticated user).

const FIELD_DATA_TYPES = ["TEXT", "SINGLE_SELECT", "DATE", "NUMBER"] as const;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const ownerArg = z.string().min(1).optional().describe("Project owner login or @me (falls back to DEFAULT_PROJECT_OWNER)");
const numberArg = z.number().int().positive().optional().describe("Project number (falls back to DEFAULT_PROJECT_NUMBER)");

interface ProjectRef {
  number: string;
  owner: string;
}

export function registerProjectTools(ctx: ToolContext): void {
  const { resolver, executor } = ctx;

  function owner(explicit: string | undefined): string | FailureResult {
    return resolver.string("project", "owner", explicit) ?? missingParam("owner", "Pass it explicitly or set DEFAULT_PROJECT_OWNER");
  }

  function project(explicitNumber: number | undefined, explicitOwner: string | undefined): ProjectRef | FailureResult {
    const number = resolver.integer("project", "number", explicitNumber);
    if (number === null) return missingParam("number", "Pass it explicitly or set DEFAULT_PROJECT_NUMBER");
    // Passed positionally; a negative value from the environment would read as a flag.
    if (number < 1) return invalidParam("number", `Project number must be positive, got ${number}`);
    const resolvedOwner = owner(explicitOwner);
    if (typeof resolvedOwner !== "string") return resolvedOwner;
    return { number: String(number), owner: resolvedOwner };
  }

  // ── list_projects ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "list_projects", description: "List the projects of a user or organization.",
    capability: "project",
    inputSchema: z.object({
      owner: ownerArg,
      limit: z.number().int().min(1).optional(),
      closed: z.boolean().optional().default(false).describe("Include closed projects"),
    }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const resolvedOwner = owner(args.owner);
    if (typeof resolvedOwner !== "string") return resolvedOwner;
    const argv = ["project", "list", option("--owner", resolvedOwner), "--format=json"];
    pushOption(argv, "--limit", resolver.integer("project", "list_limit", args.limit));
    pushSwitch(argv, "--closed", args.closed);
    return executor.execute(argv);
  });

  // ── view_project ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "view_project", description: "Show a project's details as JSON.",
    capability: "project",
    inputSchema: z.object({ number: numberArg, owner: ownerArg }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    return executor.execute(["project", "view", ref.number, option("--owner", ref.owner), "--format=json"]);
  });

  // ── list_project_fields ─────────────────────────────────────────
  registerTool(ctx, {
    name: "list_project_fields", description: "List a project's fields, with their IDs and options.",
    capability: "project",
    inputSchema: z.object({ number: numberArg, owner: ownerArg, limit: z.number().int().min(1).optional() }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    const argv = ["project", "field-list", ref.number, option("--owner", ref.owner), "--format=json"];
    pushOption(argv, "--limit", resolver.integer("project", "field_list_limit", args.limit));
    return executor.execute(argv);
  });

  // ── create_project_field ────────────────────────────────────────
  registerTool(ctx, {
    name: "create_project_field", description: "Create a custom field on a project.",
    capability: "project",
    inputSchema: z.object({
      name: z.string().min(1),
      data_type: z.enum(FIELD_DATA_TYPES),
      number: numberArg,
      owner: ownerArg,
      single_select_options: z.array(z.string().min(1)).optional().describe("Options for a SINGLE_SELECT field"),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const options = args.single_select_options ?? [];
    if (args.data_type === "SINGLE_SELECT" && options.length === 0) {
      return missingParam("single_select_options", "A SINGLE_SELECT field needs at least one option");
    }
    if (args.data_type !== "SINGLE_SELECT" && options.length > 0) {
      return invalidParam("single_select_options", "Options are only accepted for SINGLE_SELECT fields");
    }
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    const argv = [
      "project", "field-create", ref.number, option("--owner", ref.owner),
      option("--name", args.name), option("--data-type", args.data_type), "--format=json",
    ];
    if (options.length > 0) argv.push(option("--single-select-options", options.join(",")));
    return executor.execute(argv);
  });

  // ── delete_project_field ────────────────────────────────────────
  registerTool(ctx, {
    name: "delete_project_field", description: "Delete a project field by its node ID.",
    capability: "project",
    inputSchema: z.object({ field_id: z.string().min(1).describe("Field node ID from list_project_fields") }),
    annotations: { readOnlyHint: false, destructiveHint: true },
  }, async (args) => executor.execute(["project", "field-delete", option("--id", args.field_id), "--format=json"]));

  // ── list_project_items ──────────────────────────────────────────
  registerTool(ctx, {
    name: "list_project_items", description: "List the items on a project.",
    capability: "project",
    inputSchema: z.object({ number: numberArg, owner: ownerArg, limit: z.number().int().min(1).optional() }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    const argv = ["project", "item-list", ref.number, option("--owner", ref.owner), "--format=json"];
    pushOption(argv, "--limit", resolver.integer("project_item", "list_limit", args.limit));
    return executor.execute(argv);
  });

  // ── add_project_item ────────────────────────────────────────────
  registerTool(ctx, {
    name: "add_project_item", description: "Add an existing issue or pull request to a project by URL.",
    capability: "project",
    inputSchema: z.object({
      url: z.string().url().describe("Issue or pull request URL"),
      number: numberArg,
      owner: ownerArg,
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    return executor.execute(["project", "item-add", ref.number, option("--owner", ref.owner), option("--url", args.url), "--format=json"]);
  });

  // ── create_project_item ─────────────────────────────────────────
  registerTool(ctx, {
    name: "create_project_item", description: "Create a draft issue on a project.",
    capability: "project",
    inputSchema: z.object({
      title: z.string().min(1),
      body: z.string().optional(),
      number: numberArg,
      owner: ownerArg,
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    const argv = ["project", "item-create", ref.number, option("--owner", ref.owner), option("--title", args.title)];
    pushOption(argv, "--body", args.body);
    argv.push("--format=json");
    return executor.execute(argv);
  });

  // ── edit_project_item ───────────────────────────────────────────
  registerTool(ctx, {
    name: "edit_project_item",
    description: "Set or clear one field value on a project item. Exactly one of text, number_value, date, single_select_option_id, iteration_id or clear.",
    capability: "project",
    inputSchema: z.object({
      item_id: z.string().min(1).describe("Item node ID"),
      field_id: z.string().min(1).describe("Field node ID"),
      project_id: z.string().optional().describe("Project node ID (falls back to DEFAULT_PROJECT_NODE_ID)"),
      text: z.string().optional(),
      number_value: z.number().optional(),
      date: z.string().optional().describe("YYYY-MM-DD"),
      single_select_option_id: z.string().optional(),
      iteration_id: z.string().optional(),
      clear: z.boolean().optional().default(false),
    }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const projectId = resolver.string("project_item", "project_node_id", args.project_id);
    if (!projectId) return missingParam("project_id", "Pass it explicitly or set DEFAULT_PROJECT_NODE_ID");

    const values: string[] = [];
    if (args.text !== undefined) values.push(option("--text", args.text));
    if (args.number_value !== undefined) values.push(option("--number", args.number_value));
    if (args.date !== undefined) values.push(option("--date", args.date));
    if (args.single_select_option_id !== undefined) values.push(option("--single-select-option-id", args.single_select_option_id));
    if (args.iteration_id !== undefined) values.push(option("--iteration-id", args.iteration_id));

    const chosen = values.length + (args.clear ? 1 : 0);
    if (chosen !== 1) {
      return invalidParam("value", "Provide exactly one of text, number_value, date, single_select_option_id, iteration_id or clear");
    }
    if (args.date !== undefined && !ISO_DATE.test(args.date)) {
      return invalidParam("date", "Date must be in YYYY-MM-DD format");
    }

    const argv = [
      "project", "item-edit", option("--id", args.item_id), option("--field-id", args.field_id),
      option("--project-id", projectId), "--format=json",
    ];
    argv.push(values[0] ?? "--clear");
    return executor.execute(argv);
  });

  // ── archive_project_item ────────────────────────────────────────
  registerTool(ctx, {
    name: "archive_project_item", description: "Archive a project item, or restore it with undo.",
    capability: "project",
    inputSchema: z.object({
      item_id: z.string().min(1),
      number: numberArg,
      owner: ownerArg,
      undo: z.boolean().optional().default(false),
    }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    const argv = ["project", "item-archive", ref.number, option("--owner", ref.owner), option("--id", args.item_id)];
    pushSwitch(argv, "--undo", args.undo);
    argv.push("--format=json");
    return executor.execute(argv);
  });

  // ── delete_project_item ─────────────────────────────────────────
  registerTool(ctx, {
    name: "delete_project_item", description: "Remove an item from a project.",
    capability: "project",
    inputSchema: z.object({ item_id: z.string().min(1), number: numberArg, owner: ownerArg }),
    annotations: { readOnlyHint: false, destructiveHint: true },
  }, async (args) => {
    const ref = project(args.number, args.owner);
    if ("ok" in ref) return ref;
    return executor.execute(["project", "item-delete", ref.number, option("--owner", ref.owner), option("--id", args.item_id), "--format=json"]);
  });
}
