import test from 'node:test';
import assert from 'node:assert/strict';
import { EventDispatcher, dispatcherOptionsFromConfig } from './eventDispatcher.js';
import { HandlerError } from '../errors.js';
import { logger } from '../logger.js';
import { DispatcherConfigSchema } from '../types.js';

logger.setConsoleOutputEnabled(false);

// --- Helpers ---

function recorder() {
  const log: Array<{ id: number; event: number }> = [];
  const cb = (id: number) => (event: number) => {
    log.push({ id, event });
  };
  const idsFor = (event: number) => log.filter(e => e.event === event).map(e => e.id);
  return { log, cb, idsFor };
}

const sorted = (ids: number[]) => [...ids].sort((a, b) => a - b);

// --- Tests ---

test('dispatch: uncontended delivery reaches every handler once, in registration order', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor, log } = recorder();
  for (const id of [1, 2, 3, 4, 5]) d.register(id, cb(id));

  d.dispatch(7);

  assert.deepEqual(idsFor(7), [1, 2, 3, 4, 5]);
  assert.equal(log.length, 5);
});

test('dispatch: with zero handlers is a no-op', () => {
  const d = new EventDispatcher<string>();
  d.dispatch('nothing');

  assert.equal(d.size, 0);
  assert.deepEqual(d.pendingCount, { add: 0, remove: 0 });
  assert.equal(d.stats().dispatched, 1);
});

test('register: accepts an object with an invoke method', () => {
  const d = new EventDispatcher<number>();
  const seen: number[] = [];
  d.register('obj', { invoke: (e: number) => seen.push(e) });

  d.dispatch(3);

  assert.deepEqual(seen, [3]);
});

test('register: the same callback under two ids is invoked twice', () => {
  const d = new EventDispatcher<number>();
  let calls = 0;
  const cb = () => {
    calls++;
  };
  d.register('x', cb);
  d.register('y', cb);

  d.dispatch(0);

  assert.equal(calls, 2);
});

test('unregister: removing the same id twice, or an unknown id, is a no-op', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  d.register(1, cb(1));
  d.register(2, cb(2));

  d.unregister(1);
  d.unregister(1);
  d.unregister(99);
  d.dispatch(5);

  assert.deepEqual(idsFor(5), [2]);
  assert.deepEqual(d.handlerIds(), [2]);
});

test('unregister: swap-removal moves the last handler into the freed slot', () => {
  const d = new EventDispatcher<number>();
  for (const id of [1, 2, 3, 4]) d.register(id, () => {});

  d.unregister(2);

  assert.deepEqual(d.handlerIds(), [1, 4, 3]);
});

test('unregister: removing the last handler keeps the rest in order', () => {
  const d = new EventDispatcher<number>();
  for (const id of [1, 2, 3]) d.register(id, () => {});

  d.unregister(3);

  assert.deepEqual(d.handlerIds(), [1, 2]);
});

test('register: a handler registered during dispatch is skipped until the next dispatch', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  let added = false;
  d.register(1, (e: number) => {
    cb(1)(e);
    if (!added) {
      added = true;
      d.register(2, cb(2));
    }
  });

  d.dispatch(10);
  assert.deepEqual(idsFor(10), [1]);
  assert.equal(d.has(2), true);
  assert.deepEqual(d.pendingCount, { add: 0, remove: 0 });

  d.dispatch(11);
  assert.deepEqual(idsFor(11), [1, 2]);
});

test('unregister: a handler removing itself finishes the current event and is gone afterwards', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  d.register(1, cb(1));
  d.register(2, (e: number) => {
    cb(2)(e);
    d.unregister(2);
  });
  d.register(3, cb(3));

  d.dispatch(20);
  assert.deepEqual(idsFor(20), [1, 2, 3]);
  assert.equal(d.has(2), false);

  d.dispatch(21);
  d.dispatch(22);
  assert.deepEqual(sorted(idsFor(21)), [1, 3]);
  assert.deepEqual(sorted(idsFor(22)), [1, 3]);
});

test('unregister: removing a later handler mid-dispatch does not affect the in-flight pass', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  d.register(1, (e: number) => {
    cb(1)(e);
    d.unregister(2);
  });
  d.register(2, cb(2));

  d.dispatch(30);
  assert.deepEqual(idsFor(30), [1, 2]);

  d.dispatch(31);
  assert.deepEqual(idsFor(31), [1]);
});

test('reconcile: an id added and then removed during one dispatch ends up absent', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  let first = true;
  d.register(1, () => {
    if (first) d.register(9, cb(9));
  });
  d.register(2, () => {
    if (first) d.unregister(9);
    first = false;
  });

  d.dispatch(40);

  assert.equal(d.has(9), false);
  assert.deepEqual(d.handlerIds(), [1, 2]);
  d.dispatch(41);
  assert.deepEqual(idsFor(41), []);
});

test('reconcile: a live id removed and re-registered during one dispatch stays registered', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  let swapped = false;
  d.register(1, (e: number) => {
    cb(1)(e);
    if (!swapped) {
      swapped = true;
      d.unregister(1);
      d.register(1, cb(100));
    }
  });

  d.dispatch(50);
  d.dispatch(51);

  assert.deepEqual(idsFor(50), [1]);
  assert.deepEqual(idsFor(51), [100]);
  assert.equal(d.size, 1);
});

test('reconcile: an id unregistered and then registered during one dispatch becomes live', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  let first = true;
  d.register(1, () => {
    if (!first) return;
    first = false;
    d.unregister(7);
    d.register(7, cb(7));
  });

  d.dispatch(52);
  assert.deepEqual(d.handlerIds(), [1, 7]);

  d.dispatch(53);
  assert.deepEqual(idsFor(53), [7]);
});

test('reconcile: a repeated deferred unregister is a no-op for a later register', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  let first = true;
  d.register(1, () => {
    if (!first) return;
    first = false;
    d.unregister(7);
    d.unregister(7);
    d.register(7, cb(700));
  });
  d.register(7, cb(7));

  d.dispatch(54);
  assert.deepEqual(idsFor(54), [7]);
  assert.deepEqual(d.handlerIds(), [1, 7]);

  d.dispatch(55);
  assert.deepEqual(idsFor(55), [700]);
});

test('dispatch: a dispatch made while another holds the lock is dropped silently', () => {
  const d = new EventDispatcher<number>();
  const { cb, idsFor } = recorder();
  d.register(1, (e: number) => {
    cb(1)(e);
    if (e === 60) d.dispatch(61);
  });
  d.register(2, cb(2));

  d.dispatch(60);

  assert.deepEqual(idsFor(60), [1, 2]);
  assert.deepEqual(idsFor(61), []);
  assert.equal(d.stats().dropped, 1);
  assert.equal(d.stats().dispatched, 1);
});

test('dispatch: log scenario with reentrant removal and addition', () => {
  const d = new EventDispatcher<number>();
  const log: number[] = [];
  const seen = (id: number) => () => {
    log.push(id);
  };
  let rearrange = false;

  d.register(1, seen(1));
  d.register(2, () => {
    log.push(2);
    if (rearrange) {
      rearrange = false;
      d.unregister(1);
      d.register(4, seen(4));
    }
  });
  d.register(3, seen(3));

  d.dispatch(42);
  assert.deepEqual(log, [1, 2, 3]);

  // Handler 1 runs before handler 2 asks for its removal, so it still hears 43.
  rearrange = true;
  d.dispatch(43);
  assert.deepEqual(log.slice(3), [1, 2, 3]);
  assert.equal(d.has(1), false);
  assert.equal(d.has(4), true);

  d.dispatch(44);
  assert.deepEqual(sorted(log.slice(6)), [2, 3, 4]);
});

test('stats: counts deferred registrations and removals', () => {
  const d = new EventDispatcher<number>();
  d.register('a', () => {
    d.register('b', () => {});
    d.unregister('zzz');
  });

  d.dispatch(1);

  const stats = d.stats();
  assert.equal(stats.deferredAdds, 1);
  assert.equal(stats.deferredRemoves, 1);
  assert.deepEqual(d.handlerIds(), ['a', 'b']);
});

test('handler errors: isolate logs and keeps invoking the remaining handlers', () => {
  logger.clear();
  const d = new EventDispatcher<number>({ name: 'iso' });
  const { cb, idsFor } = recorder();
  d.register(1, () => {
    throw new Error('boom');
  });
  d.register(2, cb(2));

  d.dispatch(70);

  assert.deepEqual(idsFor(70), [2]);
  assert.equal(d.stats().handlerErrors, 1);
  const warnings = logger.getLogs().filter(e => e.level === 'warn' && e.scope === 'iso');
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.content, 'Handler 1 on iso failed: boom');
});

test('handler errors: isolate survives a thrown value with no string conversion', () => {
  logger.clear();
  const d = new EventDispatcher<number>({ name: 'odd-throw' });
  const { cb, idsFor } = recorder();
  d.register('bad', () => {
    throw Object.create(null);
  });
  d.register(2, cb(2));

  d.dispatch(75);

  assert.deepEqual(idsFor(75), [2]);
  const warnings = logger.getLogs().filter(e => e.level === 'warn' && e.scope === 'odd-throw');
  assert.equal(warnings[0]?.content, 'Handler bad on odd-throw failed: [object Object]');
});

test('handler errors: propagate stops the pass, still reconciles, and rethrows', () => {
  const d = new EventDispatcher<number>({ name: 'prop', handlerErrors: 'propagate' });
  const { cb, idsFor } = recorder();
  d.register(1, () => {
    d.register(3, cb(3));
    throw new Error('nope');
  });
  d.register(2, cb(2));

  assert.throws(
    () => d.dispatch(80),
    (error: unknown) => {
      assert.ok(error instanceof HandlerError);
      assert.equal(error.handlerId, 1);
      assert.equal(error.dispatcher, 'prop');
      assert.ok(error.cause instanceof Error);
      assert.equal(error.cause.message, 'nope');
      return true;
    }
  );

  assert.deepEqual(idsFor(80), []);
  assert.deepEqual(d.handlerIds(), [1, 2, 3]);

  // The lock was released: direct mutation works again.
  d.unregister(1);
  d.dispatch(81);
  assert.deepEqual(sorted(idsFor(81)), [2, 3]);
});

test('trace: deferrals and drops are logged at debug level', () => {
  logger.clear();
  logger.setLevel('debug');
  try {
    const d = new EventDispatcher<number>({ name: 'traced', trace: true });
    d.register('self', () => {
      d.register('late', () => {});
      d.dispatch(2);
    });
    d.dispatch(1);

    const lines = logger
      .getLogs()
      .filter(e => e.scope === 'traced')
      .map(e => e.content);
    assert.deepEqual(lines, [
      'Deferred register of late',
      'Dropped event: dispatcher busy',
      'Reconciled 0 removal(s), 1 addition(s)',
    ]);
  } finally {
    logger.setLevel('info');
  }
});

test('dispatcherOptionsFromConfig: maps config keys onto options', () => {
  const config = DispatcherConfigSchema.parse({ name: 'cfg', handler_errors: 'propagate' });
  assert.deepEqual(dispatcherOptionsFromConfig(config), { name: 'cfg', handlerErrors: 'propagate', trace: false });
});
