import { describe, it, expect, beforeEach } from 'vitest';
import { Printer } from '../printer.js';
import type { OutputMode } from '../outfmt.js';

class Buffered {
  text = '';
  write(chunk: string): void {
    this.text += chunk;
  }
}

describe('Printer', () => {
  let stdout: Buffered;
  let stderr: Buffered;

  function printer(mode: OutputMode): Printer {
    return new Printer(mode, stdout, stderr);
  }

  beforeEach(() => {
    stdout = new Buffered();
    stderr = new Buffered();
  });

  const tasks = { tasks: [{ id: 't1', name: 'Write docs' }] };
  const view = { headers: ['ID', 'NAME'], rows: [['t1', 'Write docs']], noun: 'tasks' };

  describe('list', () => {
    it('should print the raw value in JSON mode', () => {
      printer('json').list(tasks, view);

      expect(JSON.parse(stdout.text)).toEqual(tasks);
      expect(stderr.text).toBe('');
    });

    it('should print TSV in plain mode', () => {
      printer('plain').list(tasks, view);

      expect(stdout.text).toBe('ID\tNAME\nt1\tWrite docs\n');
      expect(stderr.text).toBe('');
    });

    it('should put the summary on stderr and the table on stdout', () => {
      printer('human').list(tasks, view);

      expect(stderr.text).toBe('Found 1 tasks\n\n');
      expect(stdout.text).toBe('ID  NAME\nt1  Write docs\n');
    });

    it('should say so when there is nothing to show', () => {
      printer('human').list({ tasks: [] }, { ...view, rows: [] });

      expect(stderr.text).toBe('No tasks found\n');
      expect(stdout.text).toBe('');
    });
  });

  describe('record', () => {
    const fields = [
      ['ID', 't1'],
      ['Due Date', null],
      ['Status', 'open'],
    ] as const;

    it('should skip empty fields for humans', () => {
      printer('human').record({}, fields);

      expect(stdout.text).toBe('ID: t1\nStatus: open\n');
    });

    it('should use upper-snake headers in plain mode', () => {
      printer('plain').record({}, fields);

      expect(stdout.text).toBe('ID\tDUE_DATE\tSTATUS\nt1\t\topen\n');
    });
  });

  describe('success', () => {
    it('should merge details into the JSON status object', () => {
      printer('json').success('Task deleted', { id: 't1' });

      expect(JSON.parse(stdout.text)).toEqual({ status: 'success', message: 'Task deleted', id: 't1' });
    });

    it('should write a status row in plain mode', () => {
      printer('plain').success('Task deleted', { id: 't1' });

      expect(stdout.text).toBe('STATUS\tID\nsuccess\tt1\n');
    });

    it('should only write the message to stderr for humans', () => {
      printer('human').success('Task deleted', { id: 't1' });

      expect(stderr.text).toBe('Task deleted\n');
      expect(stdout.text).toBe('');
    });
  });

  it('should always print warnings', () => {
    printer('json').warn('careful');
    printer('json').note('quiet');

    expect(stderr.text).toBe('careful\n');
  });
});
