import type { Redactor } from './redactor.ts';

/**
 * Logger contract used by the engine, the validator and the CLI.
 *
 * `debug` is optional; callers use `logger.debug?.(...)`.
 */
export interface Logger {
  /** Progress lines */
  log(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  /** Verbose output, only shown when DEBUG or VERBOSE is set */
  debug?(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  info(message: string): void {
    console.info(message);
  }

  debug(message: string): void {
    if (process.env.DEBUG || process.env.VERBOSE) {
      console.debug(message);
    }
  }
}

export class SilentLogger implements Logger {
  log(_message: string): void {}
  error(_message: string): void {}
  warn(_message: string): void {}
  info(_message: string): void {}
  debug(_message: string): void {}
}

/**
 * Wraps another logger and masks known secret values in every message.
 */
export class RedactingLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly redactor: Redactor
  ) {}

  log(message: string): void {
    this.inner.log(this.redactor.redact(message));
  }

  error(message: string): void {
    this.inner.error(this.redactor.redact(message));
  }

  warn(message: string): void {
    this.inner.warn(this.redactor.redact(message));
  }

  info(message: string): void {
    this.inner.info(this.redactor.redact(message));
  }

  debug(message: string): void {
    this.inner.debug?.(this.redactor.redact(message));
  }
}
