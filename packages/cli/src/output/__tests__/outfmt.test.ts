import { describe, it, expect } from 'vitest';
import { UsageError } from '../../errfmt.js';
import { envBool, modeDefaultsFromEnv, modeFromFlags, writeJson, writePlain, writeTable } from '../outfmt.js';

class Buffered {
  text = '';
  write(chunk: string): void {
    this.text += chunk;
  }
}

describe('output mode', () => {
  it('should accept the usual truthy spellings', () => {
    expect(['1', 'true', 'YES', ' y ', 'on'].map(envBool)).toEqual([true, true, true, true, true]);
    expect(['0', 'false', '', 'nope', undefined].map(envBool)).toEqual([false, false, false, false, false]);
  });

  it('should read defaults from the environment', () => {
    expect(modeDefaultsFromEnv({ CLICKUP_CLI_PLAIN: '1' })).toEqual({ json: false, plain: true });
  });

  it('should pick one mode from the flags', () => {
    expect(modeFromFlags(false, false)).toBe('human');
    expect(modeFromFlags(true, false)).toBe('json');
    expect(modeFromFlags(false, true)).toBe('plain');
  });

  it('should reject --json with --plain', () => {
    expect(() => modeFromFlags(true, true)).toThrow(
      new UsageError('invalid output mode (cannot combine --json and --plain)')
    );
  });
});

describe('writers', () => {
  it('should indent JSON by two spaces', () => {
    const out = new Buffered();
    writeJson(out, { id: 't1', tags: [] });
    expect(out.text).toBe('{\n  "id": "t1",\n  "tags": []\n}\n');
  });

  it('should write TSV and flatten whitespace inside cells', () => {
    const out = new Buffered();
    writePlain(out, ['ID', 'NAME', 'DUE'], [['t1', 'Fix\tthe\nbug', null], [2, true, undefined]]);
    expect(out.text).toBe('ID\tNAME\tDUE\nt1\tFix the bug\t\n2\ttrue\t\n');
  });

  it('should align table columns without padding the last one', () => {
    const out = new Buffered();
    writeTable(out, ['ID', 'NAME'], [['abc123', 'Short'], ['x', 'A longer name']]);
    expect(out.text).toBe('ID      NAME\nabc123  Short\nx       A longer name\n');
  });
});
