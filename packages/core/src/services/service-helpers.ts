import type { ApiClient } from '../client/api-client.js';
import { OperationError, ValidationError } from '../client/errors.js';

/**
 * What a service needs from the ClickUp client: the transport and the v3
 * workspace prefix.
 */
export interface ServiceHost {
  readonly api: ApiClient;
  v3Path(path: string): string;
}

export abstract class Service {
  constructor(protected readonly host: ServiceHost) {}

  protected get api(): ApiClient {
    return this.host.api;
  }
}

export function requireId(value: string | number | undefined, label: string = 'id'): string {
  const id = value === undefined ? '' : String(value).trim();
  if (id === '') {
    throw new ValidationError(`${label} is required`);
  }
  return id;
}

export function requireText(value: string | undefined, label: string): string {
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(`${label} is required`);
  }
  return value;
}

/**
 * Run a transport call and label any failure with the operation name.
 */
export async function labelled<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw new OperationError(operation, error);
  }
}

export type QueryValue = string | number | boolean | undefined | readonly (string | number)[];

/**
 * Encode query parameters, skipping undefined, `false` and empty arrays.
 * Array values repeat the key. Returns '' or a string starting with '?'.
 */
export function query(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === false) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        search.append(key, String(item));
      }
      continue;
    }
    search.set(key, String(value));
  }

  const encoded = search.toString();
  return encoded === '' ? '' : `?${encoded}`;
}

export function segment(value: string): string {
  return encodeURIComponent(value);
}
