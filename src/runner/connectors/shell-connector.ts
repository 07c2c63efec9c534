/**
 * shell.run builtin
 *
 * A string `command` runs through `sh -c`, so template values interpolated into it reach
 * the shell unescaped. The validator warns about that form; prefer an argv array, which is
 * spawned directly:
 *
 * steps:
 *   - id: list
 *     builtin: shell.run
 *     inputs:
 *       command: ["ls", "-la", "{{.inputs.dir}}"]
 */

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { isRecord } from '../../expression/values.ts';
import { CancelledError } from '../../types/errors.ts';
import { LIMITS, TIMEOUTS } from '../../utils/constants.ts';
import { childProcessEnv } from '../../utils/env-filter.ts';
import type { ConnectorResult } from '../executors/types.ts';

const TRUNCATED_SUFFIX = '\n[output truncated]';

export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
}

export interface ProcessOptions {
  cwd: string;
  env: Record<string, string>;
  signal: AbortSignal;
  timeoutMs?: number;
  maxOutputBytes?: number;
}

interface CapturedOutput {
  text: string;
  truncated: boolean;
}

function collectOutput(stream: Readable | null, maxBytes: number): Promise<CapturedOutput> {
  return new Promise((resolve, reject) => {
    if (!stream) {
      resolve({ text: '', truncated: false });
      return;
    }

    const chunks: Buffer[] = [];
    let bytesRead = 0;
    let truncated = false;

    // Keep draining past the cap so the child never blocks on a full pipe
    stream.on('data', (chunk: Buffer) => {
      if (truncated) return;
      if (bytesRead + chunk.byteLength > maxBytes) {
        chunks.push(chunk.subarray(0, maxBytes - bytesRead));
        truncated = true;
        return;
      }
      bytesRead += chunk.byteLength;
      chunks.push(chunk);
    });
    stream.once('error', reject);
    stream.once('close', () => {
      const text = Buffer.concat(chunks).toString('utf8');
      resolve({ text: truncated ? `${text}${TRUNCATED_SUFFIX}` : text, truncated });
    });
  });
}

/**
 * Spawn `file` with `args` and capture its output. The child is killed when `signal` aborts
 * or the timeout elapses.
 */
export async function runProcess(
  file: string,
  args: string[],
  options: ProcessOptions
): Promise<ShellResult> {
  if (options.signal.aborted) {
    throw new CancelledError();
  }

  const maxOutputBytes = options.maxOutputBytes ?? LIMITS.MAX_PROCESS_OUTPUT_BYTES;
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.DEFAULT_SHELL_TIMEOUT_MS;
  const child = spawn(file, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  let timedOut = false;
  const kill = () => {
    child.kill();
  };
  const timer = setTimeout(() => {
    timedOut = true;
    kill();
  }, timeoutMs);
  options.signal.addEventListener('abort', kill, { once: true });

  try {
    const [exitCode, stdout, stderr] = await Promise.all([
      new Promise<number>((resolve, reject) => {
        child.once('error', reject);
        child.once('close', (code) => resolve(code ?? -1));
      }),
      collectOutput(child.stdout, maxOutputBytes),
      collectOutput(child.stderr, maxOutputBytes),
    ]);

    if (options.signal.aborted) {
      throw new CancelledError();
    }
    if (timedOut) {
      throw new Error(`Shell command timed out after ${timeoutMs}ms`);
    }

    return {
      stdout: stdout.text,
      stderr: stderr.text,
      exitCode,
      stdoutTruncated: stdout.truncated,
      stderrTruncated: stderr.truncated,
    };
  } finally {
    clearTimeout(timer);
    options.signal.removeEventListener('abort', kill);
  }
}

function commandArgv(command: unknown): [string, string[]] {
  if (typeof command === 'string') {
    if (command.trim() === '') {
      throw new Error('shell.run "command" must not be empty');
    }
    return ['sh', ['-c', command]];
  }

  if (Array.isArray(command) && command.length > 0) {
    const argv = command.map((arg) => {
      if (typeof arg === 'string' || typeof arg === 'number' || typeof arg === 'boolean') {
        return String(arg);
      }
      throw new Error('shell.run "command" array must contain only strings');
    });
    const [file, ...args] = argv;
    return [file, args];
  }

  throw new Error('shell.run requires a "command" input (string or non-empty array)');
}

function stringEnv(value: unknown): Record<string, string> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error('shell.run "env" must be a mapping');
  }
  const env: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    env[key] = String(entry);
  }
  return env;
}

/**
 * Run `inputs.command`. A non-zero exit fails the step; its output is in the error message.
 *
 * Inputs: `command` (string or argv array), optional `dir`, `env` and `timeout_ms`.
 */
export async function runShellCommand(
  signal: AbortSignal,
  inputs: Record<string, unknown>,
  cwd: string
): Promise<ConnectorResult> {
  const [file, args] = commandArgv(inputs.command);
  const dir = typeof inputs.dir === 'string' && inputs.dir !== '' ? inputs.dir : cwd;
  const timeoutMs = typeof inputs.timeout_ms === 'number' ? inputs.timeout_ms : undefined;

  const result = await runProcess(file, args, {
    cwd: dir,
    env: childProcessEnv(process.env, stringEnv(inputs.env)),
    signal,
    timeoutMs,
  });

  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim();
    throw new Error(
      `Shell command exited with code ${result.exitCode}${detail ? `: ${detail.slice(0, LIMITS.ERROR_MESSAGE_TRUNCATE_LENGTH)}` : ''}`
    );
  }

  return {
    response: {
      stdout: result.stdout,
      stderr: result.stderr,
      exit_code: result.exitCode,
      stdout_truncated: result.stdoutTruncated,
      stderr_truncated: result.stderrTruncated,
    },
  };
}
