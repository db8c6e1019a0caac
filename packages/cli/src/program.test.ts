import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { resolve } from 'path';
import type { Command } from 'commander';
import { createProgram, getCommandChain } from './program.js';
import { getConfig, resetConfig } from './context.js';
import { ConfigError } from './config/index.js';

function findCommand(parent: Command, name: string): Command {
  const cmd = parent.commands.find(c => c.name() === name);
  if (!cmd) throw new Error(`missing command ${name}`);
  return cmd;
}

describe('CLI command structure', () => {
  it('creates a program with correct name', () => {
    const program = createProgram();
    expect(program.name()).toBe('erratum');
  });

  it('registers all top-level commands', () => {
    const program = createProgram();
    expect(program.commands.map(c => c.name())).toEqual(['run', 'discover', 'generate', 'evaluate', 'config']);
  });

  it('has all global options', () => {
    const program = createProgram();
    expect(program.options.map(o => o.long)).toEqual(['--version', '--verbose', '--json', '--config', '--seed']);
  });

  it('lets run and generate skip publishing', () => {
    const program = createProgram();
    for (const name of ['run', 'generate']) {
      expect(findCommand(program, name).options.map(o => o.long)).toContain('--no-publish');
    }
  });

  it('takes the error text as the required argument of generate', () => {
    const cmd = findCommand(createProgram(), 'generate');
    expect(cmd.registeredArguments).toHaveLength(1);
    expect(cmd.registeredArguments[0]?.name()).toBe('error');
    expect(cmd.registeredArguments[0]?.required).toBe(true);
  });

  it('has init and show under config', () => {
    const cmd = findCommand(createProgram(), 'config');
    expect(cmd.commands.map(c => c.name())).toEqual(['init', 'show']);
  });

  it('builds the chain of nested command names', () => {
    const program = createProgram();
    const show = findCommand(findCommand(program, 'config'), 'show');
    expect(getCommandChain(show, program)).toEqual(['config', 'show']);
  });
});

describe('config loading before actions', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'erratum-program-'));
    configPath = resolve(testDir, 'config.yaml');
    for (const name of ['ANTHROPIC_API_KEY', 'OPENAI_API_KEY', 'GEMINI_API_KEY']) vi.stubEnv(name, '');
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('loads the config named by --config', async () => {
    writeFileSync(configPath, 'quality:\n  min_overall_score: 55\n');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createProgram().parseAsync(['node', 'erratum', '--config', configPath, 'config', 'show']);

    expect(getConfig().quality.min_overall_score).toBe(55);
  });

  it('masks secrets in config show --json', async () => {
    writeFileSync(configPath, 'wordpress:\n  app_password: test-secret-password\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createProgram().parseAsync(['node', 'erratum', '--json', '--config', configPath, 'config', 'show']);

    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ wordpress: { app_password: 'test****' } });
  });

  it('refuses to run without any model key', async () => {
    await expect(
      createProgram().parseAsync(['node', 'erratum', '--config', configPath, 'run']),
    ).rejects.toThrow(ConfigError);
  });
});
