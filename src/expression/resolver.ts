import { NO_VALUE } from '../utils/constants.ts';
import { coerceBool } from './functions.ts';
import { renderTemplate } from './template.ts';
import { isRecord, lookupPath } from './values.ts';

/**
 * Resolves step parameters against the template data of a running workflow.
 *
 * - A string that is exactly one `{{.path}}` reference resolves to the raw value, keeping
 *   arrays, maps and numbers intact.
 * - Any other string containing `{{` is rendered as text. Render errors and `<no value>`
 *   results leave the original string untouched.
 * - Mappings and sequences are resolved recursively; other values pass through.
 */
export class ParameterResolver {
  static resolve(value: unknown, data: Record<string, unknown>): unknown {
    if (typeof value === 'string') {
      return ParameterResolver.resolveString(value, data);
    }
    if (Array.isArray(value)) {
      return value.map((item) => ParameterResolver.resolve(item, data));
    }
    if (isRecord(value)) {
      const resolved: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        resolved[key] = ParameterResolver.resolve(item, data);
      }
      return resolved;
    }
    return value;
  }

  static resolveMap(
    inputs: Record<string, unknown> | undefined,
    data: Record<string, unknown>
  ): Record<string, unknown> {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(inputs ?? {})) {
      resolved[key] = ParameterResolver.resolve(item, data);
    }
    return resolved;
  }

  static resolveString(value: string, data: Record<string, unknown>): unknown {
    if (!value.includes('{{')) {
      return value;
    }

    const path = ParameterResolver.pureReferencePath(value);
    if (path) {
      const found = lookupPath(data, path);
      if (found.found) {
        return found.value;
      }
    }

    return ParameterResolver.renderText(value, data);
  }

  /**
   * Render as text, returning the source unchanged on error or missing references.
   */
  static renderText(value: string, data: Record<string, unknown>): string {
    try {
      const rendered = renderTemplate(value, data);
      return rendered.includes(NO_VALUE) ? value : rendered;
    } catch {
      return value;
    }
  }

  /**
   * Segments of a pure `{{.a.b}}` reference, or undefined when the string is anything else.
   */
  static pureReferencePath(value: string): string[] | undefined {
    const trimmed = value.trim();
    if (!trimmed.startsWith('{{') || !trimmed.endsWith('}}')) {
      return undefined;
    }
    const inner = trimmed.slice(2, -2).trim();
    if (inner.includes('{{') || inner.includes('}}') || !inner.startsWith('.')) {
      return undefined;
    }
    const segments = inner.slice(1).split('.');
    return segments.every((segment) => segment.length > 0) ? segments : undefined;
  }

  /**
   * Evaluate a `when`/`until` condition to a boolean.
   *
   * Bare expressions such as `eq .status "done"` are wrapped in an action first. Errors
   * propagate so callers decide how a broken condition is treated.
   */
  static evaluateCondition(expression: string, data: Record<string, unknown>): boolean {
    const source = expression.includes('{{') ? expression : `{{ ${expression} }}`;
    const rendered = renderTemplate(source, data).trim();
    if (rendered === NO_VALUE || rendered === '<nil>') {
      return false;
    }
    return coerceBool(rendered);
  }
}
