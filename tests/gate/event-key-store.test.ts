import { EventKeyStore } from '../../src/gate/event-key-store.js';

describe('EventKeyStore', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  it('reports a key as unseen once, then as seen', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 10, maxKeyAgeMs: 30_000, now: clock });

    expect(store.seen('id:1:a')).toBe(false);
    expect(store.seen('id:1:a')).toBe(true);
    expect(store.size).toBe(1);
  });

  it('never holds more than maxTrackedKeys, dropping the oldest first', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 3, maxKeyAgeMs: 30_000, now: clock });

    for (let i = 0; i < 50; i += 1) {
      store.seen(`id:1:${i}`);
      expect(store.size).toBeLessThanOrEqual(3);
    }

    expect(store.size).toBe(3);
    expect(store.lastSeen('id:1:46')).toBeUndefined();
    expect(store.lastSeen('id:1:47')).toBe(now);
    expect(store.lastSeen('id:1:49')).toBe(now);
  });

  it('forgets keys older than maxKeyAgeMs', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 10, maxKeyAgeMs: 30_000, now: clock });
    store.seen('id:1:old');

    now += 30_001;

    expect(store.seen('id:1:old')).toBe(false);
  });

  it('keeps a key that is exactly maxKeyAgeMs old', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 10, maxKeyAgeMs: 30_000, now: clock });
    store.seen('id:1:edge');

    now += 30_000;

    expect(store.seen('id:1:edge')).toBe(true);
  });

  it('mark refreshes the timestamp and moves the key to the young end', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 2, maxKeyAgeMs: 30_000, now: clock });
    store.mark('a');
    store.mark('b');

    now += 10;
    store.mark('a');
    store.mark('c');

    expect(store.lastSeen('b')).toBeUndefined();
    expect(store.lastSeen('a')).toBe(now);
    expect(store.lastSeen('c')).toBe(now);
  });

  it('prune sweeps expired keys without a lookup', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 10, maxKeyAgeMs: 1000, now: clock });
    store.mark('a');
    store.mark('b');
    now += 500;
    store.mark('c');

    now += 600;
    store.prune();

    expect(store.size).toBe(1);
    expect(store.lastSeen('c')).toBe(1_000_500);
  });

  it('clear empties the store', () => {
    const store = new EventKeyStore({ maxTrackedKeys: 10, maxKeyAgeMs: 1000, now: clock });
    store.mark('a');
    store.clear();
    expect(store.size).toBe(0);
  });
});
