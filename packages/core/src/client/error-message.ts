/**
 * Normalizes the error bodies ClickUp returns into one message.
 *
 * Endpoints disagree on the shape: some send `{"err": ..., "ECODE": ...}` with
 * a `message`, others `{"error": "..."}`, gateways send HTML. Extractors run in
 * order and the first non-empty string wins; the status text is the fallback.
 */

import { STATUS_CODES } from 'node:http';
import { ApiError } from './errors.js';

export type MessageExtractor = (payload: Record<string, unknown>) => string | undefined;

function field(name: string): MessageExtractor {
  return (payload) => {
    const value = payload[name];
    return typeof value === 'string' && value !== '' ? value : undefined;
  };
}

export const MESSAGE_EXTRACTORS: readonly MessageExtractor[] = [field('message'), field('error')];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(bodyText: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    // Non-JSON body (HTML error page, plain text)
    return undefined;
  }

  return isRecord(parsed) ? parsed : undefined;
}

/**
 * Standard reason phrase for a status code, or `HTTP <status>` when the code
 * has none.
 */
export function statusText(status: number): string {
  return STATUS_CODES[status] ?? `HTTP ${status}`;
}

export function resolveErrorMessage(status: number, bodyText: string): string {
  const payload = parseObject(bodyText);

  if (payload) {
    for (const extract of MESSAGE_EXTRACTORS) {
      const message = extract(payload);
      if (message !== undefined) {
        return message;
      }
    }
  }

  return statusText(status);
}

export function classifyResponse(status: number, bodyText: string): ApiError {
  return new ApiError(status, resolveErrorMessage(status, bodyText));
}
