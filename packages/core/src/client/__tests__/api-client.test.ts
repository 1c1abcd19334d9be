/**
 * Tests for the HTTP transport against an in-process server
 */

import * as http from 'node:http';
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { createApiClient, withBaseUrl, withFetch, withTimeout, withUserAgent, type ApiClient } from '../api-client.js';
import { ApiError, DecodeError, SourceReadError, TransportError, ValidationError } from '../errors.js';

interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

type Handler = (res: http.ServerResponse) => void;

function reply(status: number, body: string, contentType: string = 'application/json'): Handler {
  return (res) => {
    res.writeHead(status, { 'Content-Type': contentType });
    res.end(body);
  };
}

describe('ApiClient', () => {
  let server: http.Server;
  let baseUrl: string;
  let handler: Handler;
  const requests: RecordedRequest[] = [];

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        requests.push({
          method: req.method ?? '',
          url: req.url ?? '',
          headers: req.headers,
          body: Buffer.concat(chunks).toString('utf8'),
        });
        handler(res);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    requests.length = 0;
    handler = reply(200, '{}');
  });

  function client(apiKey: string = 'pk_test'): ApiClient {
    return createApiClient(apiKey, withBaseUrl(baseUrl));
  }

  describe('end-to-end', () => {
    it('should decode a successful GET', async () => {
      handler = reply(200, '{"id":"task-1","name":"Test task"}');

      const task = await client().get<{ id: string; name: string }>('/v2/task/task-1');

      expect(task).toEqual({ id: 'task-1', name: 'Test task' });
      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.url).toBe('/api/v2/task/task-1');
    });

    it('should turn a 403 DELETE into an ApiError with the error field', async () => {
      handler = reply(403, '{"error":"forbidden"}');

      const error = await client().delete('/v2/task/task-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ statusCode: 403, message: 'forbidden' });
      expect(requests[0]?.method).toBe('DELETE');
    });

    it('should use the status text for a non-JSON 502', async () => {
      handler = reply(502, '<html><body>upstream down</body></html>', 'text/html');

      await expect(client().get('/v2/team')).rejects.toMatchObject({
        name: 'ApiError',
        statusCode: 502,
        message: 'Bad Gateway',
      });
    });

    it('should stream a multipart upload containing the file bytes and base name', async () => {
      handler = reply(200, '{"id":"att-1","title":"test.txt"}');

      const result = await client().sendMultipart<{ id: string }>({
        path: '/v2/task/task-1/attachment',
        fieldName: 'attachment',
        stream: [Buffer.from('test file content')],
        fileName: '/tmp/uploads/test.txt',
      });

      expect(result.id).toBe('att-1');
      const request = requests[0];
      expect(request?.headers['content-type']).toMatch(/^multipart\/form-data; boundary=----ClickUpCliBoundary[0-9a-f]{24}$/);
      expect(request?.headers.authorization).toBe('pk_test');
      expect(request?.body).toContain('test file content');
      expect(request?.body).toContain('name="attachment"; filename="test.txt"');
      expect(request?.body).not.toContain('/tmp/uploads');
    });
  });

  describe('request construction', () => {
    it('should send the default headers with the key verbatim', async () => {
      await client().get('/v2/user');

      const headers = requests[0]?.headers;
      expect(headers?.authorization).toBe('pk_test');
      expect(headers?.['content-type']).toBe('application/json');
      expect(headers?.['user-agent']).toBe('clickup-cli/0.1.0');
    });

    it('should omit Authorization when the key is empty', async () => {
      await client('').get('/v2/user');

      expect(requests[0]?.headers.authorization).toBeUndefined();
    });

    it('should let per-call headers override the defaults', async () => {
      await createApiClient('pk_test', withBaseUrl(baseUrl), withUserAgent('custom/1.0')).get('/v2/user', {
        headers: { Authorization: 'other', 'X-Trace': 'abc' },
      });

      const headers = requests[0]?.headers;
      expect(headers?.authorization).toBe('other');
      expect(headers?.['x-trace']).toBe('abc');
      expect(headers?.['user-agent']).toBe('custom/1.0');
    });

    it('should serialize JSON bodies', async () => {
      await client().post('/v2/list/9/task', { name: 'New task', priority: 2 });

      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.body).toBe('{"name":"New task","priority":2}');
    });

    it('should send no body for null or undefined', async () => {
      await client().post('/v2/team/1/time_entries/stop', undefined);
      await client().put('/v3/workspaces/1/tasks/t/home_list/l', null);

      expect(requests.map((request) => request.body)).toEqual(['', '']);
    });

    it('should reject bodies that cannot be serialized before sending anything', async () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;

      await expect(client().post('/x', circular)).rejects.toBeInstanceOf(ValidationError);
      await expect(client().post('/x', { count: 10n })).rejects.toBeInstanceOf(ValidationError);
      await expect(client().post('/x', () => 1)).rejects.toThrow('marshal request body: function is not JSON-serializable');
      expect(requests).toHaveLength(0);
    });

    it('should leave the shared client authenticated after an unauthenticated call', async () => {
      const shared = client();

      await shared.sendUnauthenticated('/v2/oauth/token', { code: 'test-code' });
      await shared.get('/v2/user');

      expect(requests[0]?.headers.authorization).toBeUndefined();
      expect(requests[0]?.body).toBe('{"code":"test-code"}');
      expect(requests[1]?.headers.authorization).toBe('pk_test');
    });

    it('should return the raw response from send whatever the status', async () => {
      handler = reply(404, '{"err":"Not here"}');

      const response = await client().send({ method: 'PATCH', path: '/v2/thing?x=1', body: { a: 1 } });

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('{"err":"Not here"}');
      expect(requests[0]).toMatchObject({ method: 'PATCH', url: '/api/v2/thing?x=1', body: '{"a":1}' });
    });

    it('should let the caller cancel reading the body returned by send', async () => {
      handler = (res) => {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.write('partial');
        setTimeout(() => {
          if (!res.destroyed) {
            res.end('rest');
          }
        }, 500);
      };
      const controller = new AbortController();

      const response = await client().send({ method: 'GET', path: '/v2/export', signal: controller.signal });
      controller.abort();

      await expect(response.text()).rejects.toMatchObject({ name: 'AbortError' });
    });

    it('should freeze its configuration', () => {
      const shared = client();
      expect(Object.isFrozen(shared.config)).toBe(true);
      expect(shared.withoutCredentials().config.apiKey).toBe('');
      expect(shared.config.apiKey).toBe('pk_test');
    });
  });

  describe('response handling', () => {
    it('should raise DecodeError for invalid JSON on success', async () => {
      handler = reply(200, 'not json');

      const error = await client().get('/v2/user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ statusCode: 200 });
    });

    it('should raise DecodeError for an empty success body', async () => {
      handler = reply(200, '');

      await expect(client().get('/v2/user')).rejects.toBeInstanceOf(DecodeError);
    });

    it('should discard the body when there is no target', async () => {
      handler = reply(200, 'definitely not json', 'text/plain');

      await expect(client().exec('POST', '/v2/task/t/tag/urgent')).resolves.toBeUndefined();
    });

    it('should still classify errors when there is no target', async () => {
      handler = reply(400, '{"err":"Tag exists","message":"Tag already exists"}');

      await expect(client().exec('POST', '/v2/space/1/tag', { tag: { name: 'x' } })).rejects.toMatchObject({
        statusCode: 400,
        message: 'Tag already exists',
      });
    });

    it('should fall back to the status text for an empty object', async () => {
      handler = reply(500, '{}');

      await expect(client().get('/v2/user')).rejects.toMatchObject({ message: 'Internal Server Error' });
    });

    it('should narrow the decoded value with parse', async () => {
      handler = reply(200, '{"count":3}');

      const parse = (value: unknown): number => {
        if (typeof value === 'object' && value !== null && 'count' in value && typeof value.count === 'number') {
          return value.count;
        }
        throw new Error('missing count');
      };

      await expect(client().get('/x', { parse })).resolves.toBe(3);

      handler = reply(200, '{"total":3}');
      await expect(client().get('/x', { parse })).rejects.toThrow('decode response: missing count');
    });
  });

  describe('transport failures', () => {
    it('should wrap fetch failures in TransportError', async () => {
      const failing = createApiClient(
        'pk_test',
        withFetch(() => Promise.reject(new TypeError('fetch failed')))
      );

      const error = await failing.get('/v2/user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'execute request: fetch failed', timedOut: false });
    });

    it('should time out slow responses', async () => {
      handler = (res) => {
        setTimeout(() => reply(200, '{}')(res), 500);
      };
      const slow = createApiClient('pk_test', withBaseUrl(baseUrl), withTimeout(50));

      const error = await slow.get('/v2/user').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ timedOut: true, message: 'execute request: request timed out after 50ms' });
    });

    it('should treat a zero timeout as no timeout', async () => {
      handler = (res) => {
        setTimeout(() => reply(200, '{"ok":true}')(res), 50);
      };
      const unbounded = createApiClient('pk_test', withBaseUrl(baseUrl), withTimeout(0));

      await expect(unbounded.get('/v2/user')).resolves.toEqual({ ok: true });
    });

    it('should report a failing upload source as a local read error', async () => {
      async function* source(): AsyncGenerator<string> {
        yield 'abc';
        throw new Error('EIO read failed');
      }

      const error = await client()
        .sendMultipart({ path: '/v2/task/task-1/attachment', fieldName: 'attachment', stream: source(), fileName: 'a.txt' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceReadError);
      expect(error).not.toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'copy file content: EIO read failed' });
    });

    it('should honour a caller abort signal', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await client().get('/v2/user', { signal: controller.signal }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ timedOut: false });
    });
  });
});
