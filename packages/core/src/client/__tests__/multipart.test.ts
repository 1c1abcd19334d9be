/**
 * Tests for the streaming multipart encoder
 */

import { describe, it, expect } from 'vitest';
import { encodeMultipart } from '../multipart.js';

async function collect(body: AsyncIterable<Uint8Array>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('encodeMultipart', () => {
  it('should frame a single file part with the given boundary', async () => {
    const { contentType, body } = encodeMultipart(
      { path: '/v2/task/t1/attachment', fieldName: 'attachment', stream: ['hello ', 'world'], fileName: 'notes.txt' },
      'BOUNDARY'
    );

    expect(contentType).toBe('multipart/form-data; boundary=BOUNDARY');
    expect(await collect(body)).toBe(
      '--BOUNDARY\r\n' +
        'Content-Disposition: form-data; name="attachment"; filename="notes.txt"\r\n' +
        'Content-Type: application/octet-stream\r\n' +
        '\r\n' +
        'hello world' +
        '\r\n--BOUNDARY--\r\n'
    );
  });

  it('should send only the base name of the file', async () => {
    const { body } = encodeMultipart(
      { path: '/x', fieldName: 'attachment', stream: [], fileName: '/home/user/reports/q3.pdf' },
      'B'
    );

    const text = await collect(body);
    expect(text).toContain('filename="q3.pdf"');
    expect(text).not.toContain('/home/user');
  });

  it('should escape quotes in names', async () => {
    const { body } = encodeMultipart({ path: '/x', fieldName: 'file', stream: [], fileName: 'a"b.txt' }, 'B');

    expect(await collect(body)).toContain('filename="a\\"b.txt"');
  });

  it('should drop line breaks from names so no header can be injected', async () => {
    const { body } = encodeMultipart(
      { path: '/x', fieldName: 'file\r\n', stream: [], fileName: 'a\r\nX-Injected: 1.txt' },
      'B'
    );

    const lines = (await collect(body)).split('\r\n');
    expect(lines[1]).toBe('Content-Disposition: form-data; name="file"; filename="aX-Injected: 1.txt"');
    expect(lines[2]).toBe('Content-Type: application/octet-stream');
  });

  it('should record a source failure and rethrow it', async () => {
    const cause = new Error('EIO read failed');
    async function* source(): AsyncGenerator<string> {
      yield 'abc';
      throw cause;
    }

    const upload = encodeMultipart({ path: '/x', fieldName: 'f', stream: source(), fileName: 'f.bin' }, 'B');
    expect(upload.failure()).toBeUndefined();

    await expect(collect(upload.body)).rejects.toBe(cause);
    expect(upload.failure()).toEqual({ cause });
  });

  it('should pull chunks from an async source lazily', async () => {
    const pulled: number[] = [];
    async function* source(): AsyncGenerator<Uint8Array> {
      for (const n of [1, 2]) {
        pulled.push(n);
        yield new Uint8Array([0x41 + n]);
      }
    }

    const { body } = encodeMultipart({ path: '/x', fieldName: 'f', stream: source(), fileName: 'f.bin' }, 'B');
    expect(pulled).toEqual([]);

    expect(await collect(body)).toContain('\r\n\r\nBC\r\n--B--');
    expect(pulled).toEqual([1, 2]);
  });

  it('should generate a fresh boundary per body', () => {
    const upload = { path: '/x', fieldName: 'f', stream: [], fileName: 'f' };
    expect(encodeMultipart(upload).contentType).not.toBe(encodeMultipart(upload).contentType);
  });
});
