/**
 * Renders command results in the selected output mode.
 *
 * Data goes to stdout; human-mode status lines go to stderr.
 */

import { formatCell, writeJson, writePlain, writeTable, type Cell, type OutputMode, type Writable } from './outfmt.js';

export interface TableView {
  headers: string[];
  rows: Cell[][];
  /** Plural noun for the human-mode summary line, e.g. "tasks". */
  noun: string;
}

export type Field = readonly [label: string, value: Cell];

function plainHeader(label: string): string {
  return label.toUpperCase().replace(/\s+/g, '_');
}

export class Printer {
  constructor(
    readonly mode: OutputMode,
    private stdout: Writable,
    private stderr: Writable
  ) {}

  /**
   * A collection. JSON mode prints `value` unchanged.
   */
  list(value: unknown, view: TableView): void {
    if (this.mode === 'json') {
      writeJson(this.stdout, value);
      return;
    }
    if (this.mode === 'plain') {
      writePlain(this.stdout, view.headers, view.rows);
      return;
    }

    if (view.rows.length === 0) {
      this.note(`No ${view.noun} found`);
      return;
    }
    this.note(`Found ${view.rows.length} ${view.noun}\n`);
    writeTable(this.stdout, view.headers, view.rows);
  }

  /**
   * A single entity as labelled fields. Empty fields are skipped in human mode.
   */
  record(value: unknown, fields: readonly Field[]): void {
    if (this.mode === 'json') {
      writeJson(this.stdout, value);
      return;
    }
    if (this.mode === 'plain') {
      writePlain(
        this.stdout,
        fields.map(([label]) => plainHeader(label)),
        [fields.map(([, cell]) => cell)]
      );
      return;
    }

    for (const [label, cell] of fields) {
      const text = formatCell(cell);
      if (text !== '') {
        this.stdout.write(`${label}: ${text}\n`);
      }
    }
  }

  /**
   * Outcome of a command that returns no entity.
   */
  success(message: string, details: Record<string, Cell> = {}): void {
    if (this.mode === 'json') {
      writeJson(this.stdout, { status: 'success', message, ...details });
      return;
    }
    if (this.mode === 'plain') {
      const keys = Object.keys(details);
      writePlain(this.stdout, ['STATUS', ...keys.map(plainHeader)], [['success', ...keys.map((key) => details[key])]]);
      return;
    }
    this.note(message);
  }

  /**
   * Status line for humans; silent in JSON and plain modes.
   */
  note(message: string): void {
    if (this.mode === 'human') {
      this.stderr.write(message + '\n');
    }
  }

  /**
   * Always printed to stderr, whatever the mode.
   */
  warn(message: string): void {
    this.stderr.write(message + '\n');
  }
}
