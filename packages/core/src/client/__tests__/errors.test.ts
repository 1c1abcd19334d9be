/**
 * Tests for the error taxonomy and cause-chain lookup
 */

import { describe, it, expect } from 'vitest';
import {
  ApiError,
  DecodeError,
  OperationError,
  TransportError,
  ValidationError,
  findApiError,
  findError,
} from '../errors.js';

describe('OperationError', () => {
  it('should prefix the operation and render API errors with their status', () => {
    const error = new OperationError('get task', new ApiError(404, 'Task not found'));
    expect(error.message).toBe('get task: API error (404): Task not found');
    expect(error.operation).toBe('get task');
  });

  it('should use the plain message of other errors', () => {
    const error = new OperationError('list tasks', new TransportError('execute request: connect ECONNREFUSED'));
    expect(error.message).toBe('list tasks: execute request: connect ECONNREFUSED');
  });

  it('should accept non-Error causes', () => {
    expect(new OperationError('stop timer', 'boom').message).toBe('stop timer: boom');
  });
});

describe('findError', () => {
  it('should find an error anywhere in the cause chain', () => {
    const api = new ApiError(401, 'Token invalid');
    const wrapped = new Error('outer', { cause: new OperationError('get user', api) });

    expect(findApiError(wrapped)).toBe(api);
    expect(findError(wrapped, OperationError)?.operation).toBe('get user');
  });

  it('should return undefined when nothing matches', () => {
    const error = new OperationError('decode', new DecodeError('decode response: bad', 200));
    expect(findApiError(error)).toBeUndefined();
    expect(findError(error, DecodeError)?.statusCode).toBe(200);
    expect(findError('not an error', ValidationError)).toBeUndefined();
  });

  it('should stop on cyclic cause chains', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    Object.defineProperty(first, 'cause', { value: second });

    expect(findError(first, ApiError)).toBeUndefined();
  });
});

describe('TransportError', () => {
  it('should default timedOut to false', () => {
    expect(new TransportError('x').timedOut).toBe(false);
    expect(new TransportError('x', true).timedOut).toBe(true);
  });
});
