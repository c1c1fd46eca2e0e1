import { z } from 'zod';
import { ToolRegistry } from '../../../src/tools/registry.js';
import type { Capability } from '../../../src/types/tool.js';
import { text } from '../../../src/types/result.js';
import { toolHarness } from '../../helpers/fakes.js';

describe('ToolRegistry', () => {
  const tool = (name: string, reply: string, capability: Capability = 'issue') => ({
    metadata: { name, description: name, capability, inputSchema: z.object({}) },
    execute: async () => text(reply),
  });

  it('stores tools by name', () => {
    const registry = new ToolRegistry();
    registry.register(tool('a', 'first'));
    registry.register(tool('b', 'second'));
    expect(registry.size).toBe(2);
    expect(registry.get('a')?.metadata.name).toBe('a');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('refuses a second tool under the same name and keeps the first', async () => {
    const registry = new ToolRegistry();
    registry.register(tool('a', 'first'));
    expect(() => registry.register(tool('a', 'second', 'project'))).toThrow(
      "Tool 'a' (project) is already registered by the issue tools",
    );
    expect(registry.size).toBe(1);
    expect(await registry.get('a')?.execute({})).toEqual(text('first'));
  });

  it('lists sorted names, optionally for one capability', () => {
    const registry = new ToolRegistry();
    registry.register(tool('view_project', 'x', 'project'));
    registry.register(tool('list_issues', 'x'));
    registry.register(tool('get_issue', 'x'));
    expect(registry.names()).toEqual(['get_issue', 'list_issues', 'view_project']);
    expect(registry.names('issue')).toEqual(['get_issue', 'list_issues']);
    expect(registry.names('pull_request')).toEqual([]);
  });
});

describe('registered tool set', () => {
  const { registry } = toolHarness({});

  it('registers every issue tool', () => {
    expect(registry.names('issue')).toEqual([
      'close_issue', 'comment_issue', 'create_issue', 'delete_issue', 'develop_issue',
      'edit_issue', 'get_issue', 'list_issues', 'reopen_issue',
    ]);
  });

  it('registers every pull request tool', () => {
    expect(registry.names('pull_request')).toEqual([
      'checkout_pull_request', 'close_pull_request', 'comment_pull_request', 'create_pull_request',
      'diff_pull_request', 'edit_pull_request', 'list_pull_requests', 'merge_pull_request',
      'ready_pull_request', 'reopen_pull_request', 'review_pull_request', 'status_pull_request',
      'update_branch_pull_request', 'view_pull_request',
    ]);
  });

  it('registers every project tool', () => {
    expect(registry.names('project')).toEqual([
      'add_project_item', 'archive_project_item', 'create_project_field', 'create_project_item',
      'delete_project_field', 'delete_project_item', 'edit_project_item', 'list_project_fields',
      'list_project_items', 'list_projects', 'view_project',
    ]);
  });

  it('summarizes the tool set per capability', () => {
    expect(registry.summary()).toEqual({ issue: 9, pull_request: 14, project: 11, readOnly: 10 });
  });

  it('marks read-only and destructive tools', () => {
    expect(registry.get('list_issues')?.metadata.annotations?.readOnlyHint).toBe(true);
    expect(registry.get('delete_issue')?.metadata.annotations?.destructiveHint).toBe(true);
    expect(registry.get('merge_pull_request')?.metadata.annotations?.destructiveHint).toBe(true);
  });

  it('treats missing arguments as an empty object', async () => {
    const result = await registry.get('list_projects')?.execute(undefined);
    expect(result).toEqual(text('ok'));
  });
});
