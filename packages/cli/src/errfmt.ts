/**
 * Error messages and exit codes for the command line.
 */

import { CommanderError } from 'commander';
import { ApiError, TransportError, findError } from '@clickup-cli/core';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_API = 3;
export const EXIT_TRANSPORT = 4;

/**
 * Replaces the message shown to the user; the original error stays in `cause`.
 */
export class UserFacingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UserFacingError';
  }
}

/**
 * Bad invocation: conflicting flags, malformed option values.
 */
export class UsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UsageError';
  }
}

function hintFor(error: unknown): string | undefined {
  const apiError = findError(error, ApiError);
  if (apiError?.statusCode === 401) {
    return 'Run: clickup-cli auth set-key';
  }
  if (apiError?.statusCode === 404) {
    return 'Check the ID and try again';
  }
  if (!apiError && findError(error, TransportError)) {
    return 'Check your network connection';
  }
  return undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof UserFacingError) {
    return error.message;
  }

  const message = error instanceof Error ? error.message : String(error);
  const hint = hintFor(error);
  return hint ? `${message}\n${hint}` : message;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }
  if (findError(error, UsageError)) {
    return EXIT_USAGE;
  }
  if (findError(error, ApiError)) {
    return EXIT_API;
  }
  if (findError(error, TransportError)) {
    return EXIT_TRANSPORT;
  }
  return EXIT_FAILURE;
}
