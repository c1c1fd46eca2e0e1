import pino from 'pino';
import { jest } from '@jest/globals';
import type { CommandExecutor } from '../../src/execution/executor.js';
import type { CommandResult } from '../../src/types/result.js';
import { text } from '../../src/types/result.js';
import { buildParamTable, readParamFile } from '../../src/config/params.js';
import { ParamResolver } from '../../src/params/resolver.js';
import { createToolRegistry } from '../../src/tools/index.js';
import type { ToolRegistry } from '../../src/tools/registry.js';

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export const WARN = 40;

/** A pino logger whose records land in an array instead of stderr. */
export function captureLogger() {
  const records: LogRecord[] = [];
  const log = pino({ level: 'debug' }, {
    write(line: string) {
      records.push(JSON.parse(line));
    },
  });
  return { log, records };
}

/** Executor that records every argv and answers with a canned result. */
export function fakeExecutor(result: CommandResult = text('ok')) {
  const execute = jest.fn(async (_args: readonly string[]): Promise<CommandResult> => result);
  const executor: CommandExecutor = { execute };
  return { executor, execute };
}

export interface ToolHarness {
  registry: ToolRegistry;
  execute: ReturnType<typeof fakeExecutor>['execute'];
  call(name: string, args?: Record<string, unknown>): Promise<CommandResult>;
  /** argv of the only executor call so far. */
  argv(): readonly string[];
}

/** Every tool registered against the bundled parameter table and an injected environment. */
export function toolHarness(env: NodeJS.ProcessEnv = {}, result?: CommandResult): ToolHarness {
  const { log } = captureLogger();
  const resolver = new ParamResolver(buildParamTable(readParamFile()), { env, logger: log });
  const { executor, execute } = fakeExecutor(result);
  const registry = createToolRegistry(resolver, executor);
  return {
    registry,
    execute,
    async call(name, args = {}) {
      const tool = registry.get(name);
      if (!tool) throw new Error(`tool ${name} is not registered`);
      return tool.execute(args);
    },
    argv() {
      expect(execute).toHaveBeenCalledTimes(1);
      const [first] = execute.mock.calls;
      if (!first) throw new Error('executor was not called');
      return first[0];
    },
  };
}

/** GH_REPO_OWNER/GH_REPO_NAME preset so repository tools can run. */
export const REPO_ENV: NodeJS.ProcessEnv = { GH_REPO_OWNER: 'octo-org', GH_REPO_NAME: 'widgets' };
