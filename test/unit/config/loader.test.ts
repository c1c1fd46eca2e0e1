import os from 'os';
import path from 'path';
import fs from 'fs';
import { loadConfig, DEFAULT_CONFIG } from '../../../src/config/loader.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gpm-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes a default file and reports first run when none exists', () => {
    const configPath = path.join(tmpDir, 'nested', 'config.yaml');
    const result = loadConfig(configPath);
    expect(result.firstRun).toBe(true);
    expect(result.configPath).toBe(configPath);
    expect(result.config).toEqual(DEFAULT_CONFIG);
    expect(fs.existsSync(configPath)).toBe(true);
  });

  it('reads back the generated file as the defaults', () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    loadConfig(configPath);
    const second = loadConfig(configPath);
    expect(second.firstRun).toBe(false);
    expect(second.config).toEqual(DEFAULT_CONFIG);
  });

  it('deep-merges a partial file over the defaults', () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(configPath, 'cli:\n  timeout_seconds: 30\nparameters:\n  issue:\n    limit:\n      default: 50\n');
    const { config } = loadConfig(configPath);
    expect(config.cli).toEqual({ binary: 'gh', timeout_seconds: 30, max_output_mb: 10 });
    expect(config.parameters).toEqual({ issue: { limit: { default: 50 } } });
  });

  it('falls back to the defaults when a value fails validation', () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(configPath, 'cli:\n  timeout_seconds: -5\n');
    const result = loadConfig(configPath);
    expect(result.firstRun).toBe(false);
    expect(result.config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to the defaults when the file is not valid YAML', () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(configPath, 'cli: [unclosed\n');
    expect(loadConfig(configPath).config).toEqual(DEFAULT_CONFIG);
  });
});
