/**
 * Shared utilities for CLI commands
 */

import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { glob } from 'glob';
import type { SecurityFinding } from '../parser/security-validator.ts';
import { LIMITS } from '../utils/constants.ts';
import type { Logger } from '../utils/logger.ts';
import { PathResolver } from '../utils/paths.ts';

const INPUT_KEY = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const BLOCKED_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export interface ParsedInputs {
  inputs: Record<string, unknown>;
  /** One line per rejected pair */
  problems: string[];
}

function parseValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Parse CLI input pairs (key=value) into a record.
 * Values that parse as JSON keep their type; anything else stays a string.
 */
export function parseInputs(pairs: string[] = []): ParsedInputs {
  const inputs: Record<string, unknown> = {};
  const problems: string[] = [];

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      problems.push(`Invalid input format: "${pair}" (expected key=value)`);
      continue;
    }
    const key = pair.slice(0, index);
    const raw = pair.slice(index + 1);

    if (!INPUT_KEY.test(key)) {
      problems.push(`Invalid input key: "${key}" (use alphanumeric and underscores only)`);
      continue;
    }
    if (BLOCKED_KEYS.has(key)) {
      problems.push(`Invalid input key: "${key}" (reserved keyword)`);
      continue;
    }
    if (raw.length > LIMITS.MAX_INPUT_STRING_LENGTH) {
      problems.push(
        `Input "${key}" exceeds maximum length of ${LIMITS.MAX_INPUT_STRING_LENGTH} characters`
      );
      continue;
    }
    if (raw.includes('\u0000')) {
      problems.push(`Input "${key}" contains invalid null characters`);
      continue;
    }

    inputs[key] = parseValue(raw);
  }

  return { inputs, problems };
}

/**
 * Expand CLI path arguments into workflow files. Directories are searched recursively for
 * YAML files; with no arguments the project's `.stepwright/workflows` directory is used.
 */
export async function collectWorkflowFiles(paths: string[]): Promise<{
  files: string[];
  missing: string[];
}> {
  const targets = paths.length > 0 ? paths : [join(PathResolver.getProjectDir(), 'workflows')];
  const files: string[] = [];
  const missing: string[] = [];

  for (const target of targets) {
    if (!existsSync(target)) {
      missing.push(target);
      continue;
    }
    if (statSync(target).isDirectory()) {
      const found = await glob('**/*.{yaml,yml}', { cwd: target });
      files.push(...found.sort().map((file) => join(target, file)));
    } else {
      files.push(target);
    }
  }

  return { files, missing };
}

export function formatFinding(finding: SecurityFinding): string {
  const hint = finding.suggestion ? ` (${finding.suggestion})` : '';
  return `${finding.stepId}: ${finding.message}${hint}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function reportProblems(logger: Logger, problems: string[]): void {
  for (const problem of problems) {
    logger.warn(`⚠️  ${problem}`);
  }
}
