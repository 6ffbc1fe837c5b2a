import { describe, it, expect } from '@jest/globals';
import { isConnectionMessage } from '../types.js';

describe('isConnectionMessage', () => {
  it('accepts each message kind', () => {
    expect(isConnectionMessage({ type: 'ready' })).toBe(true);
    expect(isConnectionMessage({ type: 'event', event: {} })).toBe(true);
    expect(
      isConnectionMessage({ type: 'failed', error: { name: 'Error', message: 'boom' } })
    ).toBe(true);
  });

  it('rejects malformed messages', () => {
    expect(isConnectionMessage(null)).toBe(false);
    expect(isConnectionMessage('ready')).toBe(false);
    expect(isConnectionMessage({ type: 'unknown' })).toBe(false);
    expect(isConnectionMessage({ type: 'event' })).toBe(false);
    expect(isConnectionMessage({ type: 'failed', error: 'boom' })).toBe(false);
    expect(isConnectionMessage({ type: 'failed', error: { message: 'boom' } })).toBe(false);
  });
});
