import { Mutex } from '../src/mutex';
import { sleep } from '../src/util';
import test from 'ava';

test('an unlocked mutex is acquired right away', async t => {
  const mutex = new Mutex();
  t.false(mutex.isLocked);

  const release = await mutex.acquire();
  t.true(mutex.isLocked);
  t.is(mutex.waitingCount, 0);

  release();
  t.false(mutex.isLocked);
});

test('waiters get the lock in the order they asked for it', async t => {
  const mutex = new Mutex();
  const order: number[] = [];

  const release = await mutex.acquire();
  const tasks = [1, 2, 3].map(n =>
    mutex.runExclusive(async () => {
      order.push(n);
      await sleep(10);
    })
  );

  t.is(mutex.waitingCount, 3);
  await sleep(20);
  t.deepEqual(order, [], 'nobody runs while the lock is held');

  release();
  await Promise.all(tasks);

  t.deepEqual(order, [1, 2, 3]);
  t.false(mutex.isLocked);
  t.is(mutex.waitingCount, 0);
});

test('critical sections never overlap', async t => {
  const mutex = new Mutex();
  let active = 0;
  let maxActive = 0;

  await Promise.all(
    [0, 1, 2, 3, 4].map(() =>
      mutex.runExclusive(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(5);
        active--;
      })
    )
  );

  t.is(maxActive, 1);
});

test('releasing twice has no further effect', async t => {
  const mutex = new Mutex();
  const first = await mutex.acquire();
  const second = mutex.acquire();

  first();
  const release = await second;
  t.true(mutex.isLocked, 'the lock was handed to the waiter');

  first();
  t.true(mutex.isLocked, 'a stale release does not unlock the new owner');

  release();
  t.false(mutex.isLocked);
});

test('runExclusive releases the lock when fn throws', async t => {
  const mutex = new Mutex();

  await t.throwsAsync(
    mutex.runExclusive(() => {
      throw new Error('boom');
    }),
    { message: 'boom' }
  );

  t.false(mutex.isLocked);
  t.is(await mutex.runExclusive(() => 42), 42);
});
