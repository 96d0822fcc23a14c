import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../src/utils/keyed-lock.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe('KeyedLock', () => {
  it('runs holders of overlapping keys one after another', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const first = gate();

    const a = lock.withLock(['x', 'y'], async () => {
      order.push('first start');
      await first.wait;
      order.push('first end');
    });
    const b = lock.withLock(['y'], async () => {
      order.push('second');
    });

    await tick();
    expect(order).toEqual(['first start']);

    first.open();
    await Promise.all([a, b]);
    expect(order).toEqual(['first start', 'first end', 'second']);
  });

  it('lets disjoint key sets run side by side', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const first = gate();

    const a = lock.withLock(['x'], async () => {
      await first.wait;
      order.push('x');
    });
    const b = lock.withLock(['z'], async () => {
      order.push('z');
    });

    await b;
    first.open();
    await a;
    expect(order).toEqual(['z', 'x']);
  });

  it('releases keys when the callback throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.withLock(['x'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.withLock(['x'], async () => 'ok')).resolves.toBe('ok');
    expect(lock.size).toBe(0);
  });

  it('accepts duplicate keys in one call', async () => {
    const lock = new KeyedLock();
    await expect(lock.withLock(['x', 'x'], async () => 1)).resolves.toBe(1);
    expect(lock.size).toBe(0);
  });
});
