/**
 * Tests for error body normalization
 */

import { describe, it, expect } from 'vitest';
import { classifyResponse, resolveErrorMessage, statusText } from '../error-message.js';
import { ApiError } from '../errors.js';

describe('resolveErrorMessage', () => {
  it('should prefer the message field', () => {
    expect(resolveErrorMessage(400, '{"message":"Task not found","error":"ignored"}')).toBe('Task not found');
  });

  it('should fall back to the error field', () => {
    expect(resolveErrorMessage(401, '{"err":"Token invalid","error":"Unauthorized access"}')).toBe(
      'Unauthorized access'
    );
  });

  it('should skip empty or non-string fields', () => {
    expect(resolveErrorMessage(422, '{"message":"","error":"Bad field"}')).toBe('Bad field');
    expect(resolveErrorMessage(422, '{"message":42}')).toBe('Unprocessable Entity');
  });

  it('should use the status text for non-JSON bodies', () => {
    expect(resolveErrorMessage(502, '<html>Bad Gateway</html>')).toBe('Bad Gateway');
    expect(resolveErrorMessage(500, '')).toBe('Internal Server Error');
  });

  it('should use the status text when the JSON is not an object', () => {
    expect(resolveErrorMessage(404, '["not", "an", "object"]')).toBe('Not Found');
    expect(resolveErrorMessage(404, '"just a string"')).toBe('Not Found');
  });

  it('should never return an empty message for unknown status codes', () => {
    expect(resolveErrorMessage(599, 'oops')).toBe('HTTP 599');
  });
});

describe('statusText', () => {
  it('should return the standard reason phrase', () => {
    expect(statusText(429)).toBe('Too Many Requests');
    expect(statusText(799)).toBe('HTTP 799');
  });
});

describe('classifyResponse', () => {
  it('should build an ApiError carrying the status', () => {
    const error = classifyResponse(403, '{"err":"x","message":"Forbidden for team"}');
    expect(error).toBeInstanceOf(ApiError);
    expect(error.statusCode).toBe(403);
    expect(error.message).toBe('Forbidden for team');
    expect(error.toString()).toBe('API error (403): Forbidden for team');
  });
});
