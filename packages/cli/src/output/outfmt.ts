/**
 * Output mode selection and the JSON / TSV writers.
 */

import { ENV } from '@clickup-cli/core';
import { UsageError } from '../errfmt.js';

export type OutputMode = 'json' | 'plain' | 'human';

export interface Writable {
  write(chunk: string): unknown;
}

export type Cell = string | number | boolean | null | undefined;

const TRUTHY = new Set(['1', 'true', 'yes', 'y', 'on']);

export function envBool(value: string | undefined): boolean {
  return TRUTHY.has((value ?? '').trim().toLowerCase());
}

/**
 * Flag defaults taken from CLICKUP_CLI_JSON / CLICKUP_CLI_PLAIN.
 */
export function modeDefaultsFromEnv(env: NodeJS.ProcessEnv): { json: boolean; plain: boolean } {
  return { json: envBool(env[ENV.json]), plain: envBool(env[ENV.plain]) };
}

export function modeFromFlags(json: boolean, plain: boolean): OutputMode {
  if (json && plain) {
    throw new UsageError('invalid output mode (cannot combine --json and --plain)');
  }
  if (json) return 'json';
  if (plain) return 'plain';
  return 'human';
}

export function writeJson(out: Writable, value: unknown): void {
  out.write(JSON.stringify(value, null, 2) + '\n');
}

export function formatCell(cell: Cell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  return String(cell);
}

// Tabs and newlines inside a value would break the row structure
function plainCell(cell: Cell): string {
  return formatCell(cell).replace(/[\t\r\n]+/g, ' ');
}

/**
 * Tab-separated rows, header row first when there is one.
 */
export function writePlain(out: Writable, headers: readonly string[], rows: readonly (readonly Cell[])[]): void {
  if (headers.length > 0) {
    out.write(headers.join('\t') + '\n');
  }
  for (const row of rows) {
    out.write(row.map(plainCell).join('\t') + '\n');
  }
}

/**
 * Space-aligned columns for terminals.
 */
export function writeTable(out: Writable, headers: readonly string[], rows: readonly (readonly Cell[])[]): void {
  const cells = [headers.map(String), ...rows.map((row) => row.map(plainCell))];
  const widths = headers.map((_, column) => Math.max(...cells.map((row) => (row[column] ?? '').length)));

  for (const row of cells) {
    const line = row.map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column] ?? 0)));
    out.write(line.join('  ').trimEnd() + '\n');
  }
}
