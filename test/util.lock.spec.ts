import { ReadWriteLock } from '../src/util/lock';

const deferred = () => {
  let release: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { done, release };
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('ReadWriteLock', () => {
  test('lets readers overlap', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();

    const first = lock.read(() => gate.done);
    const second = lock.read(() => gate.done);
    await flush();

    expect(lock.activeReaders).toBe(2);

    gate.release();
    await Promise.all([first, second]);
    expect(lock.activeReaders).toBe(0);
  });

  test('holds a writer until readers finish and readers behind it until it does', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const order: string[] = [];

    const reader = lock.read(async () => {
      await gate.done;
      order.push('reader');
    });
    const writer = lock.write(() => {
      order.push('writer');
    });
    const lateReader = lock.read(() => {
      order.push('late reader');
    });
    await flush();

    expect(order).toEqual([]);
    expect(lock.isWriting).toBe(false);

    gate.release();
    await Promise.all([reader, writer, lateReader]);

    expect(order).toEqual(['reader', 'writer', 'late reader']);
  });

  test('runs writers one at a time', async () => {
    const lock = new ReadWriteLock();
    let inside = 0;
    let most = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        lock.write(async () => {
          inside += 1;
          most = Math.max(most, inside);
          await flush();
          inside -= 1;
        }),
      ),
    );

    expect(most).toBe(1);
  });

  test('releases the lock when an action throws', async () => {
    const lock = new ReadWriteLock();

    await expect(
      lock.write(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isWriting).toBe(false);
    await expect(lock.read(() => 'after')).resolves.toBe('after');
  });
});
