import { z } from "zod";
import type { ToolContext } from "../context.js";
import {
  registerTool, resolveRepo, bodySource, identifier, repoArgs, invalidParam,
  option, pushOption, pushRepeated, pushJoined, pushSwitch,
} from "../helpers.js";

const PR_VIEW_FIELDS = "number,title,state,url,body,author,baseRefName,headRefName,isDraft,mergeable,labels,assignees,reviewRequests,reviews,comments,createdAt,updatedAt";
const PR_LIST_FIELDS = "number,title,state,url,author,baseRefName,headRefName,isDraft,labels,createdAt,updatedAt";

const MERGE_METHODS = ["merge", "squash", "rebase"] as const;
type MergeMethod = (typeof MERGE_METHODS)[number];

function isMergeMethod(value: string): value is MergeMethod {
  return MERGE_METHODS.some((m) => m === value);
}

export function registerPullRequestTools(ctx: ToolContext): void {
  const { resolver, executor } = ctx;
  const pr = identifier("Pull request");

  // ── create_pull_request ─────────────────────────────────────────
  registerTool(ctx, {
    name: "create_pull_request",
    description: "Open a pull request from a head branch. Base, body, draft, labels, assignees, reviewers and project fall back to configured defaults.",
    capability: "pull_request",
    inputSchema: z.object({
      title: z.string().min(1),
      head: z.string().min(1).describe("Branch containing the changes"),
      ...repoArgs,
      base: z.string().optional().describe("Target branch (falls back to DEFAULT_PR_BASE_BRANCH)"),
      body: z.string().optional(),
      draft: z.boolean().optional(),
      labels: z.array(z.string()).optional(),
      assignees: z.array(z.string()).optional(),
      reviewers: z.array(z.string()).optional(),
      project: z.string().optional(),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "create", option("--repo", slug), option("--title", args.title), option("--head", args.head)];
    pushOption(argv, "--base", resolver.string("pull_request", "base", args.base));
    pushOption(argv, "--body", resolver.string("pull_request", "body", args.body));
    pushSwitch(argv, "--draft", resolver.boolean("pull_request", "draft", args.draft));
    pushRepeated(argv, "--label", resolver.list("pull_request", "labels", args.labels));
    pushRepeated(argv, "--assignee", resolver.list("pull_request", "assignees", args.assignees));
    pushRepeated(argv, "--reviewer", resolver.list("pull_request", "reviewers", args.reviewers));
    pushOption(argv, "--project", resolver.string("pull_request", "project", args.project));
    return executor.execute(argv);
  });

  // ── list_pull_requests ──────────────────────────────────────────
  registerTool(ctx, {
    name: "list_pull_requests", description: "List pull requests with optional filters.",
    capability: "pull_request",
    inputSchema: z.object({
      ...repoArgs,
      state: z.enum(["open", "closed", "merged", "all"]).optional(),
      limit: z.number().int().min(1).optional(),
      base: z.string().optional().describe("Filter by base branch"),
      head: z.string().optional().describe("Filter by head branch"),
      author: z.string().optional(),
      assignee: z.string().optional(),
      labels: z.array(z.string()).optional(),
      search: z.string().optional(),
    }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "list", option("--repo", slug), option("--json", PR_LIST_FIELDS)];
    pushOption(argv, "--state", resolver.string("pull_request", "state", args.state));
    pushOption(argv, "--base", args.base);
    pushOption(argv, "--head", args.head);
    pushOption(argv, "--author", args.author);
    pushOption(argv, "--assignee", args.assignee);
    pushRepeated(argv, "--label", args.labels);
    pushOption(argv, "--search", args.search);
    pushOption(argv, "--limit", resolver.integer("pull_request", "limit", args.limit));
    return executor.execute(argv);
  });

  // ── view_pull_request ───────────────────────────────────────────
  registerTool(ctx, {
    name: "view_pull_request", description: "Show a pull request's details, reviews and comments as JSON.",
    capability: "pull_request",
    inputSchema: z.object({ number: pr, ...repoArgs }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    return executor.execute(["pr", "view", String(args.number), option("--repo", slug), option("--json", PR_VIEW_FIELDS)]);
  });

  // ── status_pull_request ─────────────────────────────────────────
  registerTool(ctx, {
    name: "status_pull_request", description: "Summarize pull requests relevant to the authenticated user.",
    capability: "pull_request",
    inputSchema: z.object({ ...repoArgs }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    return executor.execute(["pr", "status", option("--repo", slug)]);
  });

  // ── checkout_pull_request ───────────────────────────────────────
  registerTool(ctx, {
    name: "checkout_pull_request", description: "Check out a pull request's branch in the server's working directory.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      branch: z.string().optional().describe("Local branch name to use"),
      force: z.boolean().optional().default(false),
      detach: z.boolean().optional().default(false),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "checkout", String(args.number), option("--repo", slug)];
    pushOption(argv, "--branch", args.branch);
    pushSwitch(argv, "--force", args.force);
    pushSwitch(argv, "--detach", args.detach);
    return executor.execute(argv);
  });

  // ── close_pull_request ──────────────────────────────────────────
  registerTool(ctx, {
    name: "close_pull_request", description: "Close a pull request without merging.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      comment: z.string().optional(),
      delete_branch: z.boolean().optional().default(false),
    }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "close", String(args.number), option("--repo", slug)];
    pushOption(argv, "--comment", args.comment);
    pushSwitch(argv, "--delete-branch", args.delete_branch);
    return executor.execute(argv);
  });

  // ── comment_pull_request ────────────────────────────────────────
  registerTool(ctx, {
    name: "comment_pull_request", description: "Add a comment to a pull request from text or from a file.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      body: z.string().optional(),
      body_file: z.string().optional(),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const source = bodySource(args.body, args.body_file, true);
    if (!Array.isArray(source)) return source;
    return executor.execute(["pr", "comment", String(args.number), option("--repo", slug), ...source]);
  });

  // ── diff_pull_request ───────────────────────────────────────────
  registerTool(ctx, {
    name: "diff_pull_request", description: "Show a pull request's diff as text.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      color: z.enum(["always", "never", "auto"]).optional().default("never"),
      name_only: z.boolean().optional().default(false).describe("List changed file names only"),
      patch: z.boolean().optional().default(false).describe("Emit patch format"),
    }),
    annotations: { readOnlyHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "diff", String(args.number), option("--repo", slug), option("--color", args.color)];
    pushSwitch(argv, "--name-only", args.name_only);
    pushSwitch(argv, "--patch", args.patch);
    return executor.execute(argv);
  });

  // ── edit_pull_request ───────────────────────────────────────────
  registerTool(ctx, {
    name: "edit_pull_request", description: "Edit a pull request's title, body, base, assignees, reviewers, labels, projects or milestone.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      title: z.string().optional(),
      body: z.string().optional(),
      base: z.string().optional(),
      add_assignees: z.array(z.string()).optional(),
      remove_assignees: z.array(z.string()).optional(),
      add_reviewers: z.array(z.string()).optional(),
      remove_reviewers: z.array(z.string()).optional(),
      add_labels: z.array(z.string()).optional(),
      remove_labels: z.array(z.string()).optional(),
      add_projects: z.array(z.string()).optional(),
      remove_projects: z.array(z.string()).optional(),
      milestone: z.string().optional(),
    }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "edit", String(args.number), option("--repo", slug)];
    const fixed = argv.length;
    pushOption(argv, "--title", args.title);
    pushOption(argv, "--body", args.body);
    pushOption(argv, "--base", args.base);
    pushJoined(argv, "--add-assignee", args.add_assignees);
    pushJoined(argv, "--remove-assignee", args.remove_assignees);
    pushJoined(argv, "--add-reviewer", args.add_reviewers);
    pushJoined(argv, "--remove-reviewer", args.remove_reviewers);
    pushJoined(argv, "--add-label", args.add_labels);
    pushJoined(argv, "--remove-label", args.remove_labels);
    pushJoined(argv, "--add-project", args.add_projects);
    pushJoined(argv, "--remove-project", args.remove_projects);
    pushOption(argv, "--milestone", args.milestone);
    if (argv.length === fixed) return invalidParam("arguments", "Provide at least one field to change");
    return executor.execute(argv);
  });

  // ── ready_pull_request ──────────────────────────────────────────
  registerTool(ctx, {
    name: "ready_pull_request", description: "Mark a draft pull request ready for review, or back to draft with undo.",
    capability: "pull_request",
    inputSchema: z.object({ number: pr, ...repoArgs, undo: z.boolean().optional().default(false) }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "ready", String(args.number), option("--repo", slug)];
    pushSwitch(argv, "--undo", args.undo);
    return executor.execute(argv);
  });

  // ── reopen_pull_request ─────────────────────────────────────────
  registerTool(ctx, {
    name: "reopen_pull_request", description: "Reopen a closed pull request.",
    capability: "pull_request",
    inputSchema: z.object({ number: pr, ...repoArgs, comment: z.string().optional() }),
    annotations: { readOnlyHint: false, idempotentHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "reopen", String(args.number), option("--repo", slug)];
    pushOption(argv, "--comment", args.comment);
    return executor.execute(argv);
  });

  // ── review_pull_request ─────────────────────────────────────────
  registerTool(ctx, {
    name: "review_pull_request", description: "Approve, comment on or request changes on a pull request.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      action: z.enum(["approve", "comment", "request_changes"]),
      ...repoArgs,
      body: z.string().optional().describe("Review text; required for comment and request_changes"),
      body_file: z.string().optional(),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "review", String(args.number), option("--repo", slug)];
    if (args.action === "approve") {
      if (args.body || args.body_file) return invalidParam("body", "An approve review takes no body");
      argv.push("--approve");
      return executor.execute(argv);
    }
    const source = bodySource(args.body, args.body_file, true);
    if (!Array.isArray(source)) return source;
    argv.push(args.action === "comment" ? "--comment" : "--request-changes", ...source);
    return executor.execute(argv);
  });

  // ── merge_pull_request ──────────────────────────────────────────
  registerTool(ctx, {
    name: "merge_pull_request", description: "Merge a pull request. Method and branch deletion fall back to configured defaults.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      method: z.enum(MERGE_METHODS).optional().describe("Falls back to DEFAULT_PR_MERGE_METHOD"),
      delete_branch: z.boolean().optional().describe("Falls back to DEFAULT_PR_DELETE_BRANCH"),
      auto: z.boolean().optional().default(false).describe("Merge once requirements are met"),
      subject: z.string().optional().describe("Merge commit subject"),
      body: z.string().optional().describe("Merge commit body"),
    }),
    annotations: { readOnlyHint: false, destructiveHint: true },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    // The env default is unchecked text; only the schema guards explicit input.
    const method = resolver.string("pull_request", "merge_method", args.method) ?? "merge";
    if (!isMergeMethod(method)) {
      return invalidParam("method", `Unsupported merge method '${method}'; expected one of ${MERGE_METHODS.join(", ")}`);
    }
    const argv = ["pr", "merge", String(args.number), option("--repo", slug), `--${method}`];
    pushSwitch(argv, "--delete-branch", resolver.boolean("pull_request", "delete_branch", args.delete_branch));
    pushSwitch(argv, "--auto", args.auto);
    pushOption(argv, "--subject", args.subject);
    pushOption(argv, "--body", args.body);
    return executor.execute(argv);
  });

  // ── update_branch_pull_request ──────────────────────────────────
  registerTool(ctx, {
    name: "update_branch_pull_request", description: "Bring a pull request's branch up to date with its base.",
    capability: "pull_request",
    inputSchema: z.object({
      number: pr,
      ...repoArgs,
      rebase: z.boolean().optional().default(false).describe("Rebase instead of merging the base in"),
    }),
    annotations: { readOnlyHint: false },
  }, async (args) => {
    const slug = resolveRepo(ctx, args.owner, args.repo);
    if (typeof slug !== "string") return slug;
    const argv = ["pr", "update-branch", String(args.number), option("--repo", slug)];
    pushSwitch(argv, "--rebase", args.rebase);
    return executor.execute(argv);
  });
}
