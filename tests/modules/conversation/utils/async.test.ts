/**
 * Abortable await helper Tests
 */

import { describe, it, expect } from 'vitest';
import { untilAborted } from '@/modules/conversation';

describe('untilAborted', () => {
  it('should resolve with the promise when not aborted', async () => {
    const controller = new AbortController();

    await expect(untilAborted(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });

  it('should reject with the abort reason as soon as the signal fires', async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);

    const raced = untilAborted(never, controller.signal);
    controller.abort(new Error('stop'));

    await expect(raced).rejects.toThrow('stop');
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));

    await expect(untilAborted(Promise.resolve(1), controller.signal)).rejects.toThrow('already');
  });

  it('should pass through the promise rejection', async () => {
    const controller = new AbortController();

    await expect(
      untilAborted(Promise.reject(new Error('upstream')), controller.signal)
    ).rejects.toThrow('upstream');
  });
});
