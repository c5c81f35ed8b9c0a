/**
 * Fetch Error Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  CancelledError,
  CountParseError,
  FetchUnitError,
  cancelledFromSignal,
  isCancelledError,
  isFetchUnitError,
} from './errors.js';

describe('FetchUnitError', () => {
  it('should name the package and keep the cause', () => {
    const cause = new Error('connection reset');
    const error = new FetchUnitError('net/http', 'network', cause);

    expect(error.message).toBe('fetch net/http: connection reset');
    expect(error.kind).toBe('network');
    expect(error.cause).toBe(cause);
  });
});

describe('cancelledFromSignal', () => {
  it('should reuse a CancelledError reason', () => {
    const controller = new AbortController();
    const reason = new CancelledError('interrupted');
    controller.abort(reason);

    expect(cancelledFromSignal(controller.signal)).toBe(reason);
  });

  it('should derive the message from an Error reason', () => {
    const controller = new AbortController();
    controller.abort(new Error('shutdown'));

    expect(cancelledFromSignal(controller.signal).message).toBe('cancelled: shutdown');
  });
});

describe('type guards', () => {
  it('should recognize FetchUnitError only', () => {
    expect(isFetchUnitError(new FetchUnitError('io', 'timeout', new Error('slow')))).toBe(true);
    expect(isFetchUnitError(new CountParseError('1,2x'))).toBe(false);
    expect(isFetchUnitError('fetch io: slow')).toBe(false);
  });

  it('should recognize CancelledError only', () => {
    expect(isCancelledError(new CancelledError())).toBe(true);
    expect(isCancelledError(new Error('operation cancelled'))).toBe(false);
    expect(isCancelledError(undefined)).toBe(false);
  });
});
