import { z } from "zod";
import type { ToolContext } from "../context.js";
import {
  registerTool, resolveRepo, bodySource, identifier, repoArgs,
  option, pushOption, pushRepeated, pushJoined, pushSwitch,
} from "../helpers.js";

const ISSUE_VIEW_FIELDS = "number,title,state,url,body,createdAt,updatedAt,labels,assignees,comments,author,closedAt";
const ISSUE_LIST_FIELDS = "number,title,state,url,createdAt,updatedAt,labels,assignees";

export function registerIssueTools(ctx: ToolContext): void {
  const { resolver, executor } = ctx;

  // ── create_issue ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "create_issue", description: "Create an issue. Body, assignee, labels and project fall back to configured defaults.",
    capability: "issue",
    inputSchema: z.object({
      title: z.string().min(1).describe("Issue title"),
      ...repoArgs,
      body: z.string().optional().describe("Issue body (falls back to DEFAULT_ISSUE_BODY)"),
      assignee: z.string().optional().describe("Login to assign, or @me"),
      labels: z.array(z.string()).optional().describe("Labels to apply"),
      project: z.string().optional().describe("Project title to add the issue to"),
    }),
    annotations: { readOnlyHint: false, destructiveHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "create", option("--repo", slug), option("--title", args.title)];
    pushOption(argv, "--body", resolver.string("issue", "body", args.body));
    pushOption(argv, "--assignee", resolver.string("issue", "assignee", args.assignee));
    pushJoined(argv, "--label", resolver.list("issue", "labels", args.labels));
    pushOption(argv, "--project", resolver.string("issue", "project", args.project));
    return executor.execute(argv);
  });

  // ── get_issue ───────────────────────────────────────────────────
  registerTool(ctx, {
    name: "get_issue", description: "Get an issue's details, comments included, as JSON.",
    capability: "issue",
    inputSchema: z.object({ issue: identifier("Issue"), ...repoArgs }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    return executor.execute(["issue", "view", String(args.issue), option("--repo", slug), option("--json", ISSUE_VIEW_FIELDS)]);
  });

  // ── list_issues ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "list_issues", description: "List issues with optional filters. State and limit fall back to configured defaults.",
    capability: "issue",
    inputSchema: z.object({
      ...repoArgs,
      state: z.enum(["open", "closed", "all"]).optional(),
      limit: z.number().int().min(1).optional().describe("Maximum number of issues (falls back to DEFAULT_ISSUE_LIST_LIMIT)"),
      assignee: z.string().optional(),
      author: z.string().optional(),
      mention: z.string().optional(),
      milestone: z.string().optional(),
      labels: z.array(z.string()).optional().describe("Only issues carrying all of these labels"),
      search: z.string().optional().describe("GitHub search query"),
    }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "list", option("--repo", slug), option("--json", ISSUE_LIST_FIELDS)];
    pushOption(argv, "--state", resolver.string("issue", "state", args.state));
    pushOption(argv, "--assignee", args.assignee);
    pushOption(argv, "--author", args.author);
    pushOption(argv, "--mention", args.mention);
    pushOption(argv, "--milestone", args.milestone);
    pushRepeated(argv, "--label", args.labels);
    pushOption(argv, "--search", args.search);
    pushOption(argv, "--limit", resolver.integer("issue", "limit", args.limit));
    return executor.execute(argv);
  });

  // ── close_issue ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "close_issue", description: "Close an issue, optionally with a comment and a reason.",
    capability: "issue",
    inputSchema: z.object({
      issue: identifier("Issue"),
      ...repoArgs,
      comment: z.string().optional(),
      reason: z.enum(["completed", "not planned"]).optional(),
    }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "close", String(args.issue), option("--repo", slug)];
    pushOption(argv, "--comment", resolver.string("issue", "close_comment", args.comment));
    pushOption(argv, "--reason", args.reason);
    return executor.execute(argv);
  });

  // ── comment_issue ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "comment_issue", description: "Add a comment to an issue from text or from a file.",
    capability: "issue",
    inputSchema: z.object({
      issue: identifier("Issue"),
      ...repoArgs,
      body: z.string().optional(),
      body_file: z.string().optional().describe("Path to a file with the comment text"),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const source = bodySource(args.body, args.body_file, true);
    if (!Array.isArray(source)) return source;
    return executor.execute(["issue", "comment", String(args.issue), option("--repo", slug), ...source]);
  });

  // ── delete_issue ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "delete_issue", description: "Delete an issue (repository admin only). gh refuses without skip_confirmation when not interactive.",
    capability: "issue",
    inputSchema: z.object({
      issue: identifier("Issue"),
      ...repoArgs,
      skip_confirmation: z.boolean().optional().default(false),
    }),
    annotations: { readOnlyHint: false, destructiveHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "delete", String(args.issue), option("--repo", slug)];
    pushSwitch(argv, "--yes", args.skip_confirmation);
    return executor.execute(argv);
  });

  // ── edit_issue ──────────────────────────────────────────────────
  registerTool(ctx, {
    name: "edit_issue", description: "Edit an issue's title, body, assignees, labels, projects or milestone.",
    capability: "issue",
    inputSchema: z.object({
      issue: identifier("Issue"),
      ...repoArgs,
      title: z.string().optional(),
      body: z.string().optional(),
      add_assignees: z.array(z.string()).optional(),
      remove_assignees: z.array(z.string()).optional(),
      add_labels: z.array(z.string()).optional(),
      remove_labels: z.array(z.string()).optional(),
      add_projects: z.array(z.string()).optional(),
      remove_projects: z.array(z.string()).optional(),
      milestone: z.union([z.string(), z.number().int()]).optional().describe("Milestone name or number"),
    }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "edit", String(args.issue), option("--repo", slug)];
    pushOption(argv, "--title", args.title);
    pushOption(argv, "--body", args.body);
    pushJoined(argv, "--add-assignee", args.add_assignees);
    pushJoined(argv, "--remove-assignee", args.remove_assignees);
    pushJoined(argv, "--add-label", args.add_labels);
    pushJoined(argv, "--remove-label", args.remove_labels);
    pushJoined(argv, "--add-project", args.add_projects);
    pushJoined(argv, "--remove-project", args.remove_projects);
    const milestone = args.milestone === undefined ? undefined : String(args.milestone);
    pushOption(argv, "--milestone", resolver.string("issue", "edit_milestone", milestone));
    return executor.execute(argv);
  });

  // ── reopen_issue ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "reopen_issue", description: "Reopen a closed issue.",
    capability: "issue",
    inputSchema: z.object({ issue: identifier("Issue"), ...repoArgs, comment: z.string().optional() }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "reopen", String(args.issue), option("--repo", slug)];
    pushOption(argv, "--comment", args.comment);
    return executor.execute(argv);
  });

  // ── develop_issue ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "develop_issue", description: "Create a branch linked to an issue.",
    capability: "issue",
    inputSchema: z.object({
      issue: identifier("Issue"),
      ...repoArgs,
      base: z.string().optional().describe("Base branch (falls back to DEFAULT_BASE_BRANCH)"),
      name: z.string().optional().describe("Name of the branch to create"),
      checkout: z.boolean().optional().default(false),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["issue", "develop", String(args.issue), option("--repo", slug)];
    pushOption(argv, "--base", resolver.string("issue", "develop_base_branch", args.base));
    pushOption(argv, "--name", args.name);
    pushSwitch(argv, "--checkout", args.checkout);
    return executor.execute(argv);
  });
}
