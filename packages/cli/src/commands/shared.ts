/**
 * Helpers shared by the command modules.
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { ContentFormat, CursorPage } from '@clickup-cli/core';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errfmt.js';

export type ContextFactory = (command: Command) => CommandContext;

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer`);
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError(`"${value}" must be greater than zero`);
  }
  return parsed;
}

/**
 * Comma-separated values; the option may also be repeated.
 */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return [...previous, ...items];
}

export function collectIntegers(value: string, previous: number[] = []): number[] {
  return [...previous, ...collectList(value).map(parseInteger)];
}

/**
 * Unix milliseconds, or "now".
 */
export function parseTimestamp(value: string): number {
  return value.trim().toLowerCase() === 'now' ? Date.now() : parseInteger(value);
}

export function joinNames(items: readonly { username?: string; name?: string }[] | undefined): string {
  return (items ?? []).map((item) => item.username ?? item.name ?? '').filter((name) => name !== '').join(', ');
}

export function parseContentFormat(value: string): ContentFormat {
  if (value === 'text/md' || value === 'text/plain') {
    return value;
  }
  throw new UsageError(`invalid format "${value}" (expected text/md or text/plain)`);
}

/**
 * "-" reads the text from stdin.
 */
export async function textArgument(ctx: CommandContext, value: string): Promise<string> {
  return value === '-' ? (await ctx.readStdin()).trimEnd() : value;
}

export function noteNextCursor(ctx: CommandContext, page: CursorPage): void {
  if (page.next_cursor) {
    ctx.printer.note(`More results: --cursor ${page.next_cursor}`);
  }
}
