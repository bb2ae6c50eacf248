/**
 * Axios interceptors for verbose API request/response logging.
 *
 * Attached to the content store's axios instance, they log:
 * - Request: method, URL, masked auth header, query params, body preview
 * - Response: status, URL, timing, body preview
 *
 * Output only appears while verbose mode is active (--verbose / -V).
 */

import type { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { isVerbose } from './logger.js';

// ── Payload summarisation ────────────────────────────────────────────────

const MAX_STRING_PREVIEW = 120;   // max chars for a single string value
const MAX_ARRAY_ITEMS = 5;        // ID lists are the common payload here
const MAX_DEPTH = 2;              // how deep to recurse into objects

/**
 * Redact the Authorization header; drop everything except Content-Type.
 */
function maskHeaders(headers: object): Record<string, string> {
  const safe: Record<string, string> = {};
  for (const [key, val] of Object.entries(headers)) {
    if (val === undefined || val === null || val === '') continue;
    const strVal = String(val);
    if (key.toLowerCase() === 'authorization') {
      const parts = strVal.split(' ');
      safe[key] = parts.length === 2
        ? `${parts[0]} ${parts[1].substring(0, 4)}…`
        : '***';
    } else if (key.toLowerCase() === 'content-type') {
      safe[key] = strVal;
    }
  }
  return safe;
}

/**
 * Compact, single-line summary of a JSON-ish value.
 * Strings are truncated, arrays show length + first N items, objects show keys.
 */
function summarise(value: unknown, depth = 0): string {
  if (value === null || value === undefined) return String(value);

  if (typeof value === 'string') {
    if (value.length <= MAX_STRING_PREVIEW) return JSON.stringify(value);
    return JSON.stringify(value.slice(0, MAX_STRING_PREVIEW)) + `… (${value.length} chars)`;
  }

  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (depth >= MAX_DEPTH) return `[…${value.length} items]`;
    const preview = value
      .slice(0, MAX_ARRAY_ITEMS)
      .map(v => summarise(v, depth + 1))
      .join(', ');
    const more = value.length > MAX_ARRAY_ITEMS ? `, …+${value.length - MAX_ARRAY_ITEMS} more` : '';
    return `[${preview}${more}] (${value.length})`;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0) return '{}';
    if (depth >= MAX_DEPTH) return `{${entries.length} keys}`;
    return `{ ${entries.map(([key, v]) => `${key}: ${summarise(v, depth + 1)}`).join(', ')} }`;
  }

  return String(value);
}

function formatPayload(data: unknown): string {
  if (data === undefined || data === null || data === '') return '(empty)';
  if (typeof data === 'string') {
    try {
      return summarise(JSON.parse(data));
    } catch {
      return summarise(data);
    }
  }
  return summarise(data);
}

// ── Interceptor registration ─────────────────────────────────────────────

const startedAt = new WeakMap<InternalAxiosRequestConfig, number>();
const attached = new WeakSet<AxiosInstance>();

function elapsed(config: InternalAxiosRequestConfig | undefined): string {
  if (!config) return '';
  const start = startedAt.get(config);
  if (start === undefined) return '';
  startedAt.delete(config);
  return ` (${Date.now() - start}ms)`;
}

function requestLabel(config: InternalAxiosRequestConfig | undefined): string {
  const method = (config?.method || 'GET').toUpperCase();
  return `${method} ${config?.url || '?'}`;
}

/**
 * Attach verbose logging interceptors to an axios instance.
 * Attaching twice to the same instance is a no-op.
 */
export function attachApiLogger(client: AxiosInstance): void {
  if (attached.has(client)) return;
  attached.add(client);

  client.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    if (!isVerbose()) return config;

    startedAt.set(config, Date.now());

    const parts: string[] = [`┌─ ${requestLabel(config)}`];
    const headers = maskHeaders(config.headers);
    if (Object.keys(headers).length) {
      parts.push(`│  headers: ${JSON.stringify(headers)}`);
    }
    if (config.params && Object.keys(config.params).length) {
      parts.push(`│  params:  ${JSON.stringify(config.params)}`);
    }
    if (config.data !== undefined && config.data !== null) {
      parts.push(`│  body:    ${formatPayload(config.data)}`);
    }

    console.log(parts.join('\n'));
    return config;
  });

  client.interceptors.response.use(
    (response: AxiosResponse) => {
      if (!isVerbose()) return response;

      const parts: string[] = [`└─ ${response.status} ${requestLabel(response.config)}${elapsed(response.config)}`];
      if (response.status !== 204) {
        parts.push(`   body: ${formatPayload(response.data)}`);
      }

      console.log(parts.join('\n'));
      return response;
    },
    (error: AxiosError) => {
      if (isVerbose()) {
        const status = error.response?.status || 'NETWORK_ERROR';
        const parts: string[] = [`└─ ${status} ${requestLabel(error.config)}${elapsed(error.config)}`];
        parts.push(error.response?.data
          ? `   body: ${formatPayload(error.response.data)}`
          : `   error: ${error.message}`);
        console.error(parts.join('\n'));
      }
      return Promise.reject(error);
    },
  );
}

// Export for testing
export { summarise, maskHeaders, formatPayload };
