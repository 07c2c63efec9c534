import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CapturingLogger } from '../runner/test-harness.ts';
import { validateWorkflows } from './validate.ts';

const GOOD = `
name: good
steps:
  - id: greet
    type: transform
    template: hi
`;

const DUPLICATE_IDS = `
name: duplicate
steps:
  - id: a
    type: transform
    template: one
  - id: a
    type: transform
    template: two
`;

const RISKY = `
name: risky
inputs:
  target: { type: string }
steps:
  - id: run
    builtin: shell.run
    inputs:
      command: "ls {{.target}}"
`;

describe('validateWorkflows', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stepwright-validate-'));
    mkdirSync(join(dir, 'nested'));
    writeFileSync(join(dir, 'good.yaml'), GOOD);
    writeFileSync(join(dir, 'nested', 'duplicate.yml'), DUPLICATE_IDS);
    writeFileSync(join(dir, 'risky.yaml'), RISKY);
    writeFileSync(join(dir, 'notes.txt'), 'not a workflow');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should pass a valid file', async () => {
    const logger = new CapturingLogger();
    const file = join(dir, 'good.yaml');

    const code = await validateWorkflows([file], {}, logger);

    expect(code).toBe(0);
    expect(logger.lines).toContain(`  ✓ ${file.padEnd(40)} good (1 steps)`);
    expect(logger.lines).toContain('\nSummary: 1 passed, 0 failed.');
  });

  it('should search directories recursively for YAML files', async () => {
    const logger = new CapturingLogger();

    const code = await validateWorkflows([dir], {}, logger);

    expect(code).toBe(1);
    expect(logger.lines).toContain('🔍 Validating 3 workflow(s)...\n');
    expect(logger.lines).toContain(`  ✗ ${join(dir, 'nested', 'duplicate.yml')}`);
    expect(logger.lines).toContain('\nSummary: 2 passed, 1 failed.');
  });

  it('should report security warnings without failing by default', async () => {
    const logger = new CapturingLogger();

    const code = await validateWorkflows([join(dir, 'risky.yaml')], {}, logger);

    expect(code).toBe(0);
    const warnings = logger.entries.filter((entry) => entry.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message.startsWith(
      '      ⚠️  run: shell.run with string command contains template variables'
    )).toBe(true);
  });

  it('should fail security warnings in strict mode', async () => {
    const logger = new CapturingLogger();
    const file = join(dir, 'risky.yaml');

    const code = await validateWorkflows([file], { strict: true }, logger);

    expect(code).toBe(1);
    expect(logger.lines).toContain(`  ✗ ${file}`);
  });

  it('should report paths that do not exist', async () => {
    const logger = new CapturingLogger();
    const missing = join(dir, 'missing.yaml');

    const code = await validateWorkflows([missing], {}, logger);

    expect(code).toBe(1);
    expect(logger.lines).toEqual([
      `✗ Path not found: ${missing}`,
      '⊘ No workflow files found to validate.',
    ]);
  });

  it('should report unparseable files', async () => {
    const logger = new CapturingLogger();
    const file = join(dir, 'broken.yaml');
    writeFileSync(file, 'name: [unclosed');

    const code = await validateWorkflows([file], {}, logger);

    expect(code).toBe(1);
    expect(logger.lines).toContain(`  ✗ ${file}`);
  });
});
