import { CancelledError } from '../types/errors.ts';
import type { Logger } from '../utils/logger.ts';
import type {
  Completion,
  CompletionOptions,
  ConnectorRegistry,
  ConnectorResult,
  LLMProvider,
} from './executors/types.ts';

/**
 * In-process stand-ins for the engine's collaborators, for tests and dry runs.
 */

export type ConnectorHandler = (
  inputs: Record<string, unknown>,
  signal: AbortSignal,
  call: number
) => unknown;

export interface RecordedCall {
  ref: string;
  inputs: Record<string, unknown>;
}

/**
 * Resolves after `ms`, or rejects with CancelledError as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Connector registry answering from per-reference handlers. Tracks every call and the peak
 * number of calls in flight.
 */
export class MockConnectorRegistry implements ConnectorRegistry {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, ConnectorHandler>();
  private active = 0;
  private peak = 0;

  constructor(handlers: Record<string, ConnectorHandler> = {}) {
    for (const [ref, handler] of Object.entries(handlers)) {
      this.handlers.set(ref, handler);
    }
  }

  on(ref: string, handler: ConnectorHandler): this {
    this.handlers.set(ref, handler);
    return this;
  }

  get peakConcurrency(): number {
    return this.peak;
  }

  callsTo(ref: string): RecordedCall[] {
    return this.calls.filter((call) => call.ref === ref);
  }

  async execute(
    signal: AbortSignal,
    ref: string,
    inputs: Record<string, unknown>
  ): Promise<ConnectorResult> {
    const handler = this.handlers.get(ref);
    if (!handler) {
      throw new Error(`no mock connector for ${ref}`);
    }

    this.calls.push({ ref, inputs });
    const call = this.callsTo(ref).length;
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      return { response: await handler(inputs, signal, call) };
    } finally {
      this.active--;
    }
  }
}

export type CompletionHandler = (prompt: string, model: string) => string | Completion;

export class MockLLMProvider implements LLMProvider {
  readonly prompts: string[] = [];

  constructor(private readonly respond: CompletionHandler) {}

  async complete(
    signal: AbortSignal,
    model: string,
    prompt: string,
    _options: CompletionOptions
  ): Promise<Completion> {
    if (signal.aborted) {
      throw new CancelledError();
    }
    this.prompts.push(prompt);
    const answer = this.respond(prompt, model);
    return typeof answer === 'string' ? { text: answer, provider: 'mock' } : answer;
  }
}

export interface LogEntry {
  level: 'log' | 'error' | 'warn' | 'info' | 'debug';
  message: string;
}

/**
 * Logger that keeps every line in memory.
 */
export class CapturingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  get lines(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  log(message: string): void {
    this.entries.push({ level: 'log', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }
}
