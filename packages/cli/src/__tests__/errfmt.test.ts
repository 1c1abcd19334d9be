import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { ApiError, OperationError, SourceReadError, TransportError, ValidationError } from '@clickup-cli/core';
import { UsageError, UserFacingError, exitCodeFor, formatError } from '../errfmt.js';

describe('formatError', () => {
  it('should add the set-key hint for 401 anywhere in the chain', () => {
    const error = new OperationError('get task', new ApiError(401, 'Token invalid'));

    expect(formatError(error)).toBe('get task: API error (401): Token invalid\nRun: clickup-cli auth set-key');
  });

  it('should add the ID hint for 404', () => {
    expect(formatError(new ApiError(404, 'Not Found'))).toBe('Not Found\nCheck the ID and try again');
  });

  it('should add the network hint for transport failures', () => {
    expect(formatError(new TransportError('execute request: fetch failed'))).toBe(
      'execute request: fetch failed\nCheck your network connection'
    );
  });

  it('should treat a failed file read during upload as local', () => {
    const error = new OperationError(
      'upload attachment',
      new SourceReadError('copy file content: EIO read failed', { cause: new Error('EIO read failed') })
    );

    expect(formatError(error)).toBe('upload attachment: copy file content: EIO read failed');
    expect(exitCodeFor(error)).toBe(1);
  });

  it('should print user-facing errors as they are', () => {
    const error = new UserFacingError('cancelled', { cause: new ApiError(404, 'Not Found') });

    expect(formatError(error)).toBe('cancelled');
  });

  it('should print other errors without a hint', () => {
    expect(formatError(new ApiError(500, 'Internal Server Error'))).toBe('Internal Server Error');
    expect(formatError('plain text')).toBe('plain text');
  });
});

describe('exitCodeFor', () => {
  it('should map each error kind to its exit code', () => {
    expect(exitCodeFor(new UsageError('bad flags'))).toBe(2);
    expect(exitCodeFor(new OperationError('list tasks', new ApiError(403, 'Forbidden')))).toBe(3);
    expect(exitCodeFor(new OperationError('list tasks', new TransportError('timeout', true)))).toBe(4);
    expect(exitCodeFor(new ValidationError('task ID is required'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });

  it('should treat commander failures as usage errors', () => {
    expect(exitCodeFor(new CommanderError(1, 'commander.unknownOption', "error: unknown option '--nope'"))).toBe(2);
    expect(exitCodeFor(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'))).toBe(0);
  });
});
