import { ConversationLocks } from '../../src/services/lock.service';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConversationLocks', () => {
  it('should run tasks of one conversation in submission order', async () => {
    const locks = new ConversationLocks();
    const order: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('c1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = locks.runExclusive('c1', async () => {
      order.push('second');
    });

    expect(locks.isBusy('c1')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(locks.isBusy('c1')).toBe(false);
  });

  it('should not block other conversations', async () => {
    const locks = new ConversationLocks();
    const order: string[] = [];
    const gate = deferred();

    const slow = locks.runExclusive('c1', async () => {
      await gate.promise;
      order.push('c1');
    });
    await locks.runExclusive('c2', async () => {
      order.push('c2');
    });

    expect(order).toEqual(['c2']);
    gate.resolve();
    await slow;
    expect(order).toEqual(['c2', 'c1']);
  });

  it('should keep the chain going after a task fails', async () => {
    const locks = new ConversationLocks();

    const failing = locks.runExclusive('c1', async () => {
      throw new Error('boom');
    });
    const next = locks.runExclusive('c1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should not lose increments under concurrent read-modify-write', async () => {
    const locks = new ConversationLocks();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 25 }, () =>
        locks.runExclusive('c1', async () => {
          const read = counter;
          await new Promise((resolve) => setImmediate(resolve));
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(25);
  });

  it('should count one handle per conversation', async () => {
    const locks = new ConversationLocks();
    await locks.runExclusive('a', async () => undefined);
    await locks.runExclusive('b', async () => undefined);
    await locks.runExclusive('a', async () => undefined);

    expect(locks.size).toBe(2);
  });
});
