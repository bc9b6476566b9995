import { getErrorMessage } from './error.util';

describe('getErrorMessage', () => {
  it('appends the cause of a wrapped error', () => {
    const error = new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND stats.example.test') });

    expect(getErrorMessage(error)).toBe('fetch failed (getaddrinfo ENOTFOUND stats.example.test)');
  });

  it('uses the message alone without a distinct cause', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage(new Error('boom', { cause: new Error('boom') }))).toBe('boom');
  });

  it('stringifies non-errors', () => {
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
