import { ParamResolver, coerceEnvValue } from '../../../src/params/resolver.js';
import { buildParamTable, readParamFile } from '../../../src/config/params.js';
import { captureLogger, WARN } from '../../helpers/fakes.js';

function bundled(env: NodeJS.ProcessEnv) {
  const { log, records } = captureLogger();
  const resolver = new ParamResolver(buildParamTable(readParamFile()), { env, logger: log });
  const warnings = () => records.filter((r) => r.level === WARN);
  return { resolver, records, warnings };
}

describe('coerceEnvValue', () => {
  it('passes strings through untouched', () => {
    expect(coerceEnvValue('string', '  spaced  ')).toEqual({ ok: true, value: '  spaced  ' });
  });

  it('splits lists on commas, trims, and drops empty tokens', () => {
    expect(coerceEnvValue('list', 'a, b ,c')).toEqual({ ok: true, value: ['a', 'b', 'c'] });
    expect(coerceEnvValue('list', 'a,,b,')).toEqual({ ok: true, value: ['a', 'b'] });
    expect(coerceEnvValue('list', '')).toEqual({ ok: true, value: [] });
  });

  it('parses signed base-10 integers', () => {
    expect(coerceEnvValue('integer', ' 42 ')).toEqual({ ok: true, value: 42 });
    expect(coerceEnvValue('integer', '-7')).toEqual({ ok: true, value: -7 });
  });

  it('rejects integers with trailing garbage or a fraction', () => {
    expect(coerceEnvValue('integer', '12abc').ok).toBe(false);
    expect(coerceEnvValue('integer', '1.5').ok).toBe(false);
    expect(coerceEnvValue('integer', '').ok).toBe(false);
  });

  it('maps boolean tokens case-insensitively', () => {
    expect(coerceEnvValue('boolean', 'YES')).toEqual({ ok: true, value: true });
    expect(coerceEnvValue('boolean', ' 1 ')).toEqual({ ok: true, value: true });
    expect(coerceEnvValue('boolean', 'n')).toEqual({ ok: true, value: false });
    expect(coerceEnvValue('boolean', 'False')).toEqual({ ok: true, value: false });
    expect(coerceEnvValue('boolean', 'maybe').ok).toBe(false);
  });
});

describe('ParamResolver precedence', () => {
  it('uses the configured default when neither explicit value nor env var is present', () => {
    const { resolver } = bundled({});
    expect(resolver.resolve('issue', 'limit')).toBe(30);
    expect(resolver.resolve('pull_request', 'assignees')).toEqual(['@me']);
  });

  it('prefers the env var over the default', () => {
    const { resolver } = bundled({ DEFAULT_ISSUE_LABELS: 'bug, urgent' });
    expect(resolver.resolve('issue', 'labels')).toEqual(['bug', 'urgent']);
  });

  it('prefers an explicit value over the env var', () => {
    const { resolver } = bundled({ DEFAULT_ISSUE_LIST_LIMIT: '50' });
    expect(resolver.resolve('issue', 'limit', 5)).toBe(5);
  });

  it('treats an explicit empty string or empty list as provided', () => {
    const { resolver } = bundled({ DEFAULT_ISSUE_BODY: 'from env', DEFAULT_ISSUE_LABELS: 'bug' });
    expect(resolver.resolve('issue', 'body', '')).toBe('');
    expect(resolver.resolve('issue', 'labels', [])).toEqual([]);
  });

  it('treats explicit null as absent', () => {
    const { resolver } = bundled({ DEFAULT_ISSUE_LIST_STATE: 'closed' });
    expect(resolver.resolve('issue', 'state', null)).toBe('closed');
  });

  it('decodes an empty list env var to an empty list rather than the default', () => {
    const { resolver } = bundled({ DEFAULT_PR_ASSIGNEES: '' });
    expect(resolver.resolve('pull_request', 'assignees')).toEqual([]);
  });

  it('falls back to the default and warns once when an integer env var does not decode', () => {
    const { resolver, warnings } = bundled({ DEFAULT_ISSUE_LIST_LIMIT: 'abc' });
    expect(resolver.resolve('issue', 'limit')).toBe(30);
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatchObject({ envVar: 'DEFAULT_ISSUE_LIST_LIMIT', value: 'abc' });
  });

  it('falls back to the default for an unrecognised boolean token', () => {
    const { resolver, warnings } = bundled({ DEFAULT_PR_DELETE_BRANCH: 'sometimes' });
    expect(resolver.resolve('pull_request', 'delete_branch')).toBe(true);
    expect(warnings()).toHaveLength(1);
  });

  it('resolves unknown parameters to null with a warning', () => {
    const { resolver, warnings } = bundled({});
    expect(resolver.resolve('issue', 'no_such_param')).toBeNull();
    expect(resolver.resolve('no_such_capability', 'limit')).toBeNull();
    expect(warnings()).toHaveLength(2);
  });

  it('returns null for a parameter with no env var value and no default', () => {
    const { resolver, warnings } = bundled({});
    expect(resolver.resolve('pull_request', 'reviewers')).toBeNull();
    expect(warnings()).toHaveLength(0);
  });

  it('is idempotent for a fixed environment', () => {
    const { resolver } = bundled({ DEFAULT_PR_REVIEWERS: 'alice,bob' });
    const first = resolver.resolve('pull_request', 'reviewers');
    expect(resolver.resolve('pull_request', 'reviewers')).toEqual(first);
    expect(first).toEqual(['alice', 'bob']);
  });

  it('never writes to the environment it reads', () => {
    const env: NodeJS.ProcessEnv = { DEFAULT_PR_DRAFT: 'yes' };
    const { resolver } = bundled(env);
    expect(resolver.resolve('pull_request', 'draft')).toBe(true);
    expect(env).toEqual({ DEFAULT_PR_DRAFT: 'yes' });
  });
});

describe('ParamResolver typed accessors', () => {
  it('narrow values of the declared type', () => {
    const { resolver } = bundled({ DEFAULT_PR_DRAFT: '0' });
    expect(resolver.integer('pull_request', 'limit')).toBe(30);
    expect(resolver.boolean('pull_request', 'draft')).toBe(false);
    expect(resolver.string('pull_request', 'base')).toBe('main');
    expect(resolver.list('issue', 'labels')).toBeNull();
  });

  it('return null and warn when the resolved value has another type', () => {
    const { resolver, warnings } = bundled({});
    expect(resolver.string('issue', 'limit')).toBeNull();
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatchObject({ expected: 'string', actual: 'number' });
  });

  it('exposes the frozen spec entry through lookup', () => {
    const { resolver } = bundled({});
    const spec = resolver.lookup('issue', 'labels');
    expect(spec).toEqual({ type: 'list', envVar: 'DEFAULT_ISSUE_LABELS', default: null });
    expect(Object.isFrozen(spec)).toBe(true);
  });
});
