import { describe, it, expect } from 'vitest';
import { RemoteError, UNEXPECTED_ERROR_MESSAGE, ValidationError, toUserMessage } from './errors';

describe('error types', () => {
  it('tags where the failure happened', () => {
    expect(new ValidationError('Prompt is required').kind).toBe('validation');
    const remote = new RemoteError('Throttled', 429);
    expect(remote.kind).toBe('remote');
    expect(remote.status).toBe(429);
  });
});

describe('toUserMessage', () => {
  it('passes task errors through', () => {
    expect(toUserMessage(new ValidationError('Prompt is required'))).toBe('Prompt is required');
    expect(toUserMessage(new RemoteError('Model request failed'))).toBe('Model request failed');
  });

  it('wraps other errors', () => {
    expect(toUserMessage(new TypeError('boom'))).toBe(`${UNEXPECTED_ERROR_MESSAGE} (boom)`);
  });

  it('falls back for non-errors', () => {
    expect(toUserMessage('oops')).toBe(UNEXPECTED_ERROR_MESSAGE);
    expect(toUserMessage(undefined)).toBe(UNEXPECTED_ERROR_MESSAGE);
  });
});
