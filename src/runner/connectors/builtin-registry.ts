import { type Logger, SilentLogger } from '../../utils/logger.ts';
import { type PathRoots, PathResolver } from '../../utils/paths.ts';
import type { ConnectorRegistry, ConnectorResult } from '../executors/types.ts';
import { isFileOperation, runFileOperation } from './file-connector.ts';
import { type FetchFn, isHttpOperation, runHttpRequest } from './http-connector.ts';
import { runShellCommand } from './shell-connector.ts';
import { isTransformOperation, runTransformOperation } from './transform-connector.ts';

export interface BuiltinConnectorOptions {
  roots?: PathRoots;
  fetch?: FetchFn;
  maxResponseBytes?: number;
  logger?: Logger;
}

function splitRef(ref: string): [string, string] {
  const dot = ref.indexOf('.');
  return dot === -1 ? [ref, ''] : [ref.slice(0, dot), ref.slice(dot + 1)];
}

/**
 * Connectors implemented by the engine: `shell.run`, `file.read|write|list`,
 * `http.get|post|put|patch|delete|head` and
 * `transform.split|filter|map|sort|group|merge|concat|flatten|jq`.
 */
export class BuiltinConnectorRegistry implements ConnectorRegistry {
  private readonly roots: PathRoots;
  private readonly logger: Logger;

  constructor(private readonly options: BuiltinConnectorOptions = {}) {
    this.roots = options.roots ?? PathResolver.defaultRoots();
    this.logger = options.logger ?? new SilentLogger();
  }

  handles(ref: string): boolean {
    const [connector, operation] = splitRef(ref);
    switch (connector) {
      case 'shell':
        return operation === 'run';
      case 'file':
        return isFileOperation(operation);
      case 'http':
        return isHttpOperation(operation);
      case 'transform':
        return isTransformOperation(operation);
      default:
        return false;
    }
  }

  async execute(
    signal: AbortSignal,
    ref: string,
    inputs: Record<string, unknown>
  ): Promise<ConnectorResult> {
    const [connector, operation] = splitRef(ref);
    this.logger.debug?.(`  builtin ${connector}.${operation}`);

    if (connector === 'shell' && operation === 'run') {
      return runShellCommand(signal, inputs, this.roots.cwd);
    }
    if (connector === 'file' && isFileOperation(operation)) {
      return runFileOperation(signal, operation, inputs, this.roots);
    }
    if (connector === 'http' && isHttpOperation(operation)) {
      return runHttpRequest(signal, operation, inputs, {
        fetch: this.options.fetch,
        maxResponseBytes: this.options.maxResponseBytes,
      });
    }
    if (connector === 'transform' && isTransformOperation(operation)) {
      return runTransformOperation(operation, inputs);
    }
    throw new Error(`unknown builtin operation: ${ref}`);
  }
}

/**
 * Routes builtin references to the builtin registry and everything else to the user
 * registry.
 */
export class CompositeConnectorRegistry implements ConnectorRegistry {
  constructor(
    private readonly builtins: BuiltinConnectorRegistry,
    private readonly user?: ConnectorRegistry
  ) {}

  execute(signal: AbortSignal, ref: string, inputs: Record<string, unknown>): Promise<ConnectorResult> {
    if (this.builtins.handles(ref)) {
      return this.builtins.execute(signal, ref, inputs);
    }
    if (!this.user) {
      return Promise.reject(new Error(`no connector registered for ${ref}`));
    }
    return this.user.execute(signal, ref, inputs);
  }
}
