import { isRecord } from '../../expression/values.ts';
import { CancelledError } from '../../types/errors.ts';
import { LIMITS, TIMEOUTS } from '../../utils/constants.ts';
import type { ConnectorResult } from '../executors/types.ts';

export const HTTP_OPERATIONS = ['get', 'post', 'put', 'patch', 'delete', 'head'] as const;
export type HttpOperation = (typeof HTTP_OPERATIONS)[number];

export function isHttpOperation(operation: string): operation is HttpOperation {
  return HTTP_OPERATIONS.some((op) => op === operation);
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetch?: FetchFn;
  maxResponseBytes?: number;
}

export async function readResponseTextWithLimit(
  response: Response,
  maxBytes: number
): Promise<{ text: string; truncated: boolean }> {
  if (!response.body) {
    return { text: '', truncated: false };
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';
  let bytesRead = 0;

  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    if (!value) continue;

    if (bytesRead + value.byteLength > maxBytes) {
      const allowed = maxBytes - bytesRead;
      if (allowed > 0) {
        text += decoder.decode(value.slice(0, allowed), { stream: true });
      }
      text += decoder.decode();
      await reader.cancel();
      return { text, truncated: true };
    }

    bytesRead += value.byteLength;
    text += decoder.decode(value, { stream: true });
  }

  text += decoder.decode();
  return { text, truncated: false };
}

function buildUrl(operation: HttpOperation, inputs: Record<string, unknown>): string {
  if (typeof inputs.url !== 'string' || inputs.url === '') {
    throw new Error(`http.${operation} requires a "url" input`);
  }
  const url = new URL(inputs.url);
  if (isRecord(inputs.query)) {
    for (const [key, value] of Object.entries(inputs.query)) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.href;
}

function buildHeaders(inputs: Record<string, unknown>): Record<string, string> {
  const headers: Record<string, string> = {};
  if (isRecord(inputs.headers)) {
    for (const [key, value] of Object.entries(inputs.headers)) {
      headers[key] = String(value);
    }
  }
  return headers;
}

function buildBody(body: unknown, headers: Record<string, string>): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === 'string') {
    return body;
  }

  const contentType = Object.entries(headers).find(
    ([key]) => key.toLowerCase() === 'content-type'
  )?.[1];

  if (contentType?.includes('application/x-www-form-urlencoded') && isRecord(body)) {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(body)) {
      params.append(key, String(value));
    }
    return params.toString();
  }

  if (!contentType) {
    headers['Content-Type'] = 'application/json';
  }
  return JSON.stringify(body);
}

/**
 * Execute an http builtin with `fetch`.
 *
 * Inputs: `url`, optional `headers`, `query`, `body` and `timeout_ms`. JSON response bodies
 * are parsed; others stay text. Non-2xx statuses fail the step.
 */
export async function runHttpRequest(
  signal: AbortSignal,
  operation: HttpOperation,
  inputs: Record<string, unknown>,
  options: HttpOptions = {}
): Promise<ConnectorResult> {
  if (signal.aborted) {
    throw new CancelledError();
  }

  const url = buildUrl(operation, inputs);
  const headers = buildHeaders(inputs);
  const method = operation.toUpperCase();
  const body = method === 'GET' || method === 'HEAD' ? undefined : buildBody(inputs.body, headers);
  const timeoutMs =
    typeof inputs.timeout_ms === 'number' ? inputs.timeout_ms : TIMEOUTS.DEFAULT_HTTP_TIMEOUT_MS;
  const maxBytes = options.maxResponseBytes ?? LIMITS.MAX_HTTP_RESPONSE_BYTES;

  const controller = new AbortController();
  const onAbort = () => controller.abort(new CancelledError());
  signal.addEventListener('abort', onAbort, { once: true });
  const timeoutId = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  try {
    const doFetch = options.fetch ?? fetch;
    const response = await doFetch(url, { method, headers, body, signal: controller.signal });

    const contentLength = Number.parseInt(response.headers.get('content-length') ?? '', 10);
    if (Number.isFinite(contentLength) && contentLength > maxBytes) {
      throw new Error(
        `Response too large: Content-Length ${contentLength} bytes exceeds limit of ${maxBytes} bytes`
      );
    }

    const { text, truncated } = await readResponseTextWithLimit(response, maxBytes);
    if (!response.ok) {
      throw new Error(
        `HTTP ${response.status}: ${response.statusText}${text ? `\nResponse Body: ${text.slice(0, LIMITS.ERROR_MESSAGE_TRUNCATE_LENGTH)}` : ''}`
      );
    }

    let data: unknown = text;
    if (!truncated && text !== '') {
      try {
        data = JSON.parse(text);
      } catch {
        data = text;
      }
    }

    return { response: data, rawResponse: text, statusCode: response.status };
  } finally {
    clearTimeout(timeoutId);
    signal.removeEventListener('abort', onAbort);
  }
}
