import { describe, expect, test } from '@jest/globals';
import { ScanTimeoutError } from '../../src/errors/scan-error';
import {
  deadlineFor,
  OperationAbortedError,
  ScanDeadline,
  throwIfAborted,
} from '../../src/utils/deadline';

const manualClock = (start = 1_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

describe('throwIfAborted', () => {
  test('does nothing without a signal or before abort', () => {
    expect(() => throwIfAborted()).not.toThrow();
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
  });

  test('throws the abort reason when it is an Error', () => {
    const controller = new AbortController();
    const reason = new Error('client went away');
    controller.abort(reason);
    expect(() => throwIfAborted(controller.signal)).toThrow(reason);
  });

  test('wraps string reasons', () => {
    const controller = new AbortController();
    controller.abort('stop');
    expect(() => throwIfAborted(controller.signal)).toThrow(OperationAbortedError);
    expect(() => throwIfAborted(controller.signal)).toThrow('stop');
  });
});

describe('ScanDeadline', () => {
  test('does not expire until the budget is exceeded', () => {
    const clock = manualClock();
    const deadline = new ScanDeadline(100, { now: clock.now });

    clock.advance(100);
    expect(deadline.expired).toBe(false);
    expect(() => deadline.check()).not.toThrow();

    clock.advance(1);
    expect(deadline.elapsedMs).toBe(101);
    expect(deadline.expired).toBe(true);
    expect(() => deadline.check()).toThrow(ScanTimeoutError);
  });

  test('a zero budget never expires', () => {
    const clock = manualClock();
    const deadline = new ScanDeadline(0, { now: clock.now });
    clock.advance(60_000);
    expect(() => deadline.check()).not.toThrow();
  });

  test('check reports caller cancellation before the budget', () => {
    const controller = new AbortController();
    const deadline = ScanDeadline.unbounded(controller.signal);
    controller.abort();

    let thrown: unknown;
    try {
      deadline.check();
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(Error);
    expect(thrown).not.toBeInstanceOf(ScanTimeoutError);
    expect(thrown instanceof Error ? thrown.name : undefined).toBe('AbortError');
  });

  test('deadlineFor prefers the explicit timeout', () => {
    expect(deadlineFor(250, 30_000).timeoutMs).toBe(250);
    expect(deadlineFor(0, 30_000).timeoutMs).toBe(0);
    expect(deadlineFor(undefined, 30_000).timeoutMs).toBe(30_000);
  });
});
