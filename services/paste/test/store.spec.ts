import { describe, expect, it, vi } from 'vitest';
import { StorageError } from '../src/errors';
import { createTestStore } from './helpers';

describe('RedisPasteStore', () => {
  it('issues strictly increasing ids starting at 1', async () => {
    const { store } = createTestStore();
    const ids: number[] = [];
    for (let i = 0; i < 3; i += 1) {
      ids.push(await store.update((tx) => tx.nextSequence()));
    }
    expect(ids).toEqual([1, 2, 3]);
    await expect(store.view((tx) => tx.sequence())).resolves.toBe(3);
  });

  it('commits puts and deletes made in one update', async () => {
    const { store } = createTestStore();
    await store.update(async (tx) => {
      tx.put(await tx.nextSequence(), 'one');
      tx.put(await tx.nextSequence(), 'two');
    });
    await store.update(async (tx) => {
      tx.delete(1);
    });

    const [one, two] = await store.view(async (tx) => [await tx.get(1), await tx.get(2)]);
    expect(one).toBeNull();
    expect(two).toBe('two');
  });

  it('writes nothing when the update callback throws', async () => {
    const { store, redis, filesKey } = createTestStore();
    const boom = new Error('abort');

    await expect(
      store.update(async (tx) => {
        tx.put(await tx.nextSequence(), 'never');
        throw boom;
      }),
    ).rejects.toBe(boom);

    expect(await redis.hgetall(filesKey)).toEqual({});
    // the burned id is not handed out again
    await expect(store.update((tx) => tx.nextSequence())).resolves.toBe(2);
  });

  it('keeps a read snapshot stable while a writer commits', async () => {
    const { store } = createTestStore();
    await store.update(async (tx) => tx.put(await tx.nextSequence(), 'first'));

    const seen = await store.view(async (tx) => {
      await store.update(async (w) => w.put(await w.nextSequence(), 'second'));
      return { second: await tx.get(2), sequence: await tx.sequence() };
    });

    expect(seen).toEqual({ second: null, sequence: 1 });
    await expect(store.view((tx) => tx.get(2))).resolves.toBe('second');
  });

  it('lets a writer read its own buffered writes', async () => {
    const { store } = createTestStore();
    await store.update(async (tx) => tx.put(await tx.nextSequence(), 'old'));

    const inside = await store.update(async (tx) => {
      tx.put(1, 'new');
      tx.put(await tx.nextSequence(), 'added');
      const keys: number[] = [];
      await tx.forEach((id) => {
        keys.push(id);
      });
      return { value: await tx.get(1), keys, sequence: await tx.sequence() };
    });

    expect(inside).toEqual({ value: 'new', keys: [1, 2], sequence: 2 });
  });

  it('visits entries in byte order of their keys and stops on false', async () => {
    const { store, redis, filesKey } = createTestStore();
    await redis.hset(filesKey, '2', 'b');
    await redis.hset(filesKey, '10', 'j');
    await redis.hset(filesKey, '1', 'a');

    const all: number[] = [];
    await store.view((tx) =>
      tx.forEach((id) => {
        all.push(id);
      }),
    );
    expect(all).toEqual([1, 10, 2]);

    const firstTwo: string[] = [];
    await store.view((tx) =>
      tx.forEach((_id, value) => {
        firstTwo.push(value);
        return firstTwo.length < 2;
      }),
    );
    expect(firstTwo).toEqual(['a', 'j']);
  });

  it('serializes concurrent writers', async () => {
    const { store } = createTestStore();
    const order: string[] = [];

    await Promise.all([
      store.update(async (tx) => {
        order.push('a:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        tx.put(await tx.nextSequence(), 'a');
        order.push('a:end');
      }),
      store.update(async (tx) => {
        order.push('b:start');
        tx.put(await tx.nextSequence(), 'b');
        order.push('b:end');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('reports redis failures as StorageError', async () => {
    const { store, redis } = createTestStore();
    vi.spyOn(redis, 'incr').mockRejectedValueOnce(new Error('connection lost'));

    const failure = store.update((tx) => tx.nextSequence());
    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toThrow('next sequence failed: connection lost');

    // a failed writer does not wedge the queue
    await expect(store.update((tx) => tx.nextSequence())).resolves.toBe(1);
  });

  it('rejects ids that were never issued', async () => {
    const { store } = createTestStore();
    await expect(store.update(async (tx) => tx.put(0, 'x'))).rejects.toThrow('invalid record id: 0');
  });

  it('answers pings', async () => {
    const { store } = createTestStore();
    await expect(store.ping()).resolves.toBeUndefined();
  });
});
