import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DebugLogger, withRequestLogging } from '../logger.js';
import type { FetchLike } from '../../client/api-client.js';

class Collector {
  lines: string[] = [];
  write(chunk: string): void {
    this.lines.push(chunk);
  }
}

const fixedNow = () => new Date('2026-03-01T10:20:30.456Z');

describe('DebugLogger', () => {
  let sink: Collector;

  beforeEach(() => {
    sink = new Collector();
  });

  it('should drop lines below the configured level', () => {
    const logger = new DebugLogger({ sink, now: fixedNow });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('careful');
    logger.error('broken');

    expect(sink.lines).toEqual([
      '[2026-03-01T10:20:30.456Z] WARN careful\n',
      '[2026-03-01T10:20:30.456Z] ERROR broken\n',
    ]);
  });

  it('should write debug lines when verbose', () => {
    const logger = new DebugLogger({ level: 'debug', sink, now: fixedNow });

    logger.debug('details');

    expect(sink.lines).toEqual(['[2026-03-01T10:20:30.456Z] DEBUG details\n']);
  });

  describe('session file', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clickup-cli-log-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should keep every level in the session file', () => {
      const logger = new DebugLogger({ sink, now: fixedNow, logDir: path.join(dir, 'log') });

      logger.debug('request sent');
      logger.warn('slow');

      expect(logger.logPath).toBe(path.join(dir, 'log', '2026-03-01T10-20-30-456Z.log'));
      expect(fs.readFileSync(path.join(dir, 'log', '2026-03-01T10-20-30-456Z.log'), 'utf-8')).toBe(
        '[2026-03-01T10:20:30.456Z] DEBUG request sent\n[2026-03-01T10:20:30.456Z] WARN slow\n'
      );
      expect(sink.lines).toEqual(['[2026-03-01T10:20:30.456Z] WARN slow\n']);
    });
  });
});

describe('withRequestLogging', () => {
  it('should log method, URL and status without headers', async () => {
    const sink = new Collector();
    const logger = new DebugLogger({ level: 'debug', sink, now: fixedNow });
    const fetchImpl: FetchLike = async () => new Response('{}', { status: 201 });

    await withRequestLogging(fetchImpl, logger)('https://clickup.test/api/v2/user', {
      method: 'post',
      headers: { Authorization: 'test-secret' },
    });

    expect(sink.lines[0]).toBe('[2026-03-01T10:20:30.456Z] DEBUG → POST https://clickup.test/api/v2/user\n');
    expect(sink.lines[1]).toMatch(/^\[2026-03-01T10:20:30\.456Z\] DEBUG ← 201 POST https:\/\/clickup\.test\/api\/v2\/user \(\d+ms\)\n$/);
    expect(sink.lines.join('')).not.toContain('test-secret');
  });

  it('should log and rethrow failures', async () => {
    const sink = new Collector();
    const logger = new DebugLogger({ level: 'debug', sink, now: fixedNow });
    const failure = new TypeError('fetch failed');
    const fetchImpl: FetchLike = () => Promise.reject(failure);

    await expect(withRequestLogging(fetchImpl, logger)('https://clickup.test/x', {})).rejects.toBe(failure);
    expect(sink.lines[1]).toMatch(/DEBUG ✗ GET https:\/\/clickup\.test\/x failed after \d+ms: fetch failed\n$/);
  });
});
