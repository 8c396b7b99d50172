import { describe, it, expect } from 'vitest';
import { InMemoryQueue, InMemoryQueueProvider } from '../../../src/infrastructure/queue/InMemoryQueue.js';

function createClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('InMemoryQueue', () => {
  it('should claim items oldest first with the requested lease', async () => {
    const clock = createClock();
    const queue = new InMemoryQueue('q', { now: clock.now });
    await queue.createItem({ n: 1 });
    await queue.createItem({ n: 2 });

    const first = await queue.claimItem(30);

    expect(first).toEqual({ id: '1', data: { n: 1 }, created: 1_000_000, expire: 1_030_000 });
    expect((await queue.claimItem())?.data).toEqual({ n: 2 });
    expect(await queue.claimItem()).toBeNull();
  });

  it('should count claimed items until they are deleted', async () => {
    const queue = new InMemoryQueue('q');
    await queue.createItem({ n: 1 });
    const item = await queue.claimItem();

    expect(await queue.numberOfItems()).toBe(1);
    if (item) await queue.deleteItem(item);
    expect(await queue.numberOfItems()).toBe(0);
  });

  it('should make a released item claimable again', async () => {
    const queue = new InMemoryQueue('q');
    await queue.createItem({ n: 1 });
    const item = await queue.claimItem();
    if (item) await queue.releaseItem(item);

    expect((await queue.claimItem())?.id).toBe('1');
  });

  it('should release only leases that have expired', async () => {
    const clock = createClock();
    const queue = new InMemoryQueue('q', { now: clock.now });
    await queue.createItem({ n: 1 });
    await queue.createItem({ n: 2 });
    await queue.claimItem(10);
    clock.advance(5_000);
    await queue.claimItem(10);
    clock.advance(6_000);

    expect(await queue.releaseExpired()).toBe(1);
    expect((await queue.claimItem())?.id).toBe('1');
    expect(await queue.claimItem()).toBeNull();
  });
});

describe('InMemoryQueueProvider', () => {
  it('should return the same queue for the same name', () => {
    const provider = new InMemoryQueueProvider();

    expect(provider.get('a')).toBe(provider.get('a'));
    expect(provider.get('a')).not.toBe(provider.get('b'));
    expect(provider.get('b').name).toBe('b');
  });
});
