/**
 * Secret masking for log lines and recorded step data.
 *
 * `Redactor` replaces known secret values inside free text. `maskSensitive`
 * replaces values whose key names look sensitive, regardless of the value.
 */

import { MASKED_VALUE } from './constants.ts';

const SENSITIVE_KEY_PARTS = [
  'token',
  'password',
  'secret',
  'api_key',
  'apikey',
  'auth',
  'credential',
] as const;

// Common words that would cause noisy redaction if treated as secrets
const VALUE_BLOCKLIST = new Set([
  'true',
  'false',
  'null',
  'undefined',
  'default',
  'success',
  'failed',
  'skipped',
  'pending',
]);

export const REDACTED_PLACEHOLDER = '***REDACTED***';

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

/**
 * Recursively replace values under sensitive keys with the mask placeholder.
 * Returns a new structure; the input is not modified.
 */
export function maskSensitive(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => maskSensitive(item));
  }
  if (value !== null && typeof value === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      masked[key] = isSensitiveKey(key) ? MASKED_VALUE : maskSensitive(val);
    }
    return masked;
  }
  return value;
}

export interface RedactorOptions {
  /** Values that are always redacted, whatever their length */
  forcedSecrets?: string[];
}

export class Redactor {
  private combinedPattern: RegExp | null = null;

  /**
   * @param secrets - named values; values under sensitive names are redacted from 6 chars,
   *   others only from 10 chars to avoid masking ordinary words
   */
  constructor(secrets: Record<string, unknown>, options: RedactorOptions = {}) {
    const toRedact = new Set<string>();

    for (const forced of options.forcedSecrets ?? []) {
      if (forced.length > 0) toRedact.add(forced);
    }

    for (const [key, value] of Object.entries(secrets)) {
      if (typeof value !== 'string' || value.length === 0) continue;
      if (VALUE_BLOCKLIST.has(value.toLowerCase())) continue;
      const minLength = isSensitiveKey(key) ? 6 : 10;
      if (value.length >= minLength) {
        toRedact.add(value);
      }
    }

    // Longest first so that overlapping secrets are fully masked
    const parts = Array.from(toRedact)
      .sort((a, b) => b.length - a.length)
      .map((secret) => secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));

    if (parts.length > 0) {
      this.combinedPattern = new RegExp(parts.join('|'), 'g');
    }
  }

  get active(): boolean {
    return this.combinedPattern !== null;
  }

  redact(text: string): string {
    if (!this.combinedPattern || text.length === 0) {
      return text;
    }
    return text.replace(this.combinedPattern, REDACTED_PLACEHOLDER);
  }

  redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.redact(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }
    if (value !== null && typeof value === 'object') {
      const redacted: Record<string, unknown> = {};
      for (const [key, val] of Object.entries(value)) {
        redacted[key] = this.redactValue(val);
      }
      return redacted;
    }
    return value;
  }
}
