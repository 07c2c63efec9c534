import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { LIMITS } from '../../utils/constants.ts';
import { type PathRoots, PathResolver } from '../../utils/paths.ts';
import type { ConnectorResult } from '../executors/types.ts';

export const FILE_OPERATIONS = ['read', 'write', 'list'] as const;
export type FileOperation = (typeof FILE_OPERATIONS)[number];

export function isFileOperation(operation: string): operation is FileOperation {
  return FILE_OPERATIONS.some((op) => op === operation);
}

function requirePath(operation: FileOperation, inputs: Record<string, unknown>, roots: PathRoots) {
  const raw = inputs.path;
  if (typeof raw !== 'string' || raw.trim() === '') {
    throw new Error(`file.${operation} requires a "path" input`);
  }
  return PathResolver.expand(raw, roots);
}

async function readFile(targetPath: string): Promise<ConnectorResult> {
  let size: number;
  try {
    size = (await fs.stat(targetPath)).size;
  } catch {
    throw new Error(`File not found: ${targetPath}`);
  }
  if (size > LIMITS.MAX_FILE_READ_BYTES) {
    throw new Error(
      `File exceeds maximum read size of ${LIMITS.MAX_FILE_READ_BYTES} bytes: ${targetPath}`
    );
  }
  return { response: await fs.readFile(targetPath, 'utf8') };
}

async function writeFile(
  targetPath: string,
  inputs: Record<string, unknown>
): Promise<ConnectorResult> {
  if (inputs.content === undefined) {
    throw new Error('Content is required for write operation');
  }
  const content =
    typeof inputs.content === 'string' ? inputs.content : JSON.stringify(inputs.content, null, 2);

  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  if (inputs.append === true) {
    await fs.appendFile(targetPath, content);
  } else {
    await fs.writeFile(targetPath, content);
  }
  return { response: { path: targetPath, bytes: Buffer.byteLength(content) } };
}

async function listFiles(
  targetPath: string,
  inputs: Record<string, unknown>
): Promise<ConnectorResult> {
  const pattern = typeof inputs.pattern === 'string' && inputs.pattern !== '' ? inputs.pattern : '*';
  const files = (await glob(pattern, { cwd: targetPath, nodir: inputs.dirs !== true })).sort();
  return { response: { path: targetPath, files, count: files.length } };
}

/**
 * Execute a file builtin. Paths may start with `$out`, `$temp` or `~`; relative paths
 * resolve against `roots.cwd`.
 */
export async function runFileOperation(
  signal: AbortSignal,
  operation: FileOperation,
  inputs: Record<string, unknown>,
  roots: PathRoots
): Promise<ConnectorResult> {
  if (signal.aborted) {
    throw new Error('File operation aborted');
  }
  const targetPath = requirePath(operation, inputs, roots);

  switch (operation) {
    case 'read':
      return readFile(targetPath);
    case 'write':
      return writeFile(targetPath, inputs);
    case 'list':
      return listFiles(targetPath, inputs);
  }
}
