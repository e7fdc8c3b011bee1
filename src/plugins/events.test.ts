import { describe, it, expect, vi, beforeEach } from 'vitest';
import vm from 'vm';
import { PluginEventBus } from './events.js';
import { EventPriority, type EventPayload, type Logger } from './types.js';

function makeLogger(): Logger {
  const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn(() => log) };
  return log;
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('PluginEventBus', () => {
  let logger: Logger;
  let bus: PluginEventBus;

  beforeEach(() => {
    logger = makeLogger();
    bus = new PluginEventBus({ logger });
  });

  it('should deliver payloads to handlers', () => {
    const handler = vi.fn();
    bus.subscribe('document_uploaded', handler);
    bus.publishSync('document_uploaded', { file: 'report.csv' });
    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0][0]).toEqual({ file: 'report.csv' });
    expect(handler.mock.calls[0][1].name).toBe('document_uploaded');
  });

  it('should run handlers by descending priority', () => {
    const order: string[] = [];
    bus.subscribe('e', () => { order.push('low'); }, EventPriority.LOW);
    bus.subscribe('e', () => { order.push('high'); }, EventPriority.HIGH);
    bus.subscribe('e', () => { order.push('normal'); });
    bus.publishSync('e', {});
    expect(order).toEqual(['high', 'normal', 'low']);
  });

  it('should break priority ties by subscription order', () => {
    const order: string[] = [];
    bus.subscribe('e', () => { order.push('a'); });
    bus.subscribe('e', () => { order.push('b'); });
    bus.subscribe('e', () => { order.push('critical'); }, EventPriority.CRITICAL);
    bus.subscribe('e', () => { order.push('c'); });
    bus.publishSync('e', {});
    expect(order).toEqual(['critical', 'a', 'b', 'c']);
  });

  it('should not crash if a handler throws', () => {
    const after = vi.fn();
    bus.subscribe('e', function boom() { throw new Error('boom'); }, EventPriority.HIGH);
    bus.subscribe('e', after);

    expect(() => bus.publishSync('e', {})).not.toThrow();
    expect(after).toHaveBeenCalledOnce();
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'e', handler: 'boom' }),
      'Event handler failed',
    );
  });

  it('should catch rejections of async handlers on the sync path', async () => {
    bus.subscribe('e', async () => { throw new Error('later'); });
    bus.publishSync('e', {});
    await flush();
    expect(logger.error).toHaveBeenCalledOnce();
  });

  it('should catch rejections of promises from another realm', async () => {
    bus.subscribe('e', () => vm.runInNewContext('Promise.reject(new Error("elsewhere"))'));
    bus.publishSync('e', {});
    await flush();
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'e' }),
      'Event handler failed',
    );
  });

  it('should invoke duplicate subscriptions once each', () => {
    const handler = vi.fn();
    bus.subscribe('e', handler);
    bus.subscribe('e', handler);
    bus.publishSync('e', {});
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should remove every binding of a handler with unsubscribe()', () => {
    const handler = vi.fn();
    const other = vi.fn();
    bus.subscribe('e', handler);
    bus.subscribe('e', handler, EventPriority.HIGH);
    bus.subscribe('e', other);
    bus.unsubscribe('e', handler);
    bus.publishSync('e', {});
    expect(handler).not.toHaveBeenCalled();
    expect(other).toHaveBeenCalledOnce();
    expect(bus.countHandlers('e')).toBe(1);
  });

  it('should treat unsubscribe of an unknown handler as a no-op', () => {
    expect(() => bus.unsubscribe('nothing', vi.fn())).not.toThrow();
    expect(bus.listEvents()).toEqual([]);
  });

  it('should let handlers share a mutable payload', () => {
    bus.subscribe('e', (data) => { data.seen = ['first']; }, EventPriority.HIGH);
    let seen: unknown;
    bus.subscribe('e', (data: EventPayload) => { seen = data.seen; });
    bus.publishSync('e', {});
    expect(seen).toEqual(['first']);
  });

  describe('history', () => {
    it('should record events even without handlers', () => {
      bus.publishSync('orphan', { n: 1 }, 'tests');
      const [event] = bus.history();
      expect(event.name).toBe('orphan');
      expect(event.data).toEqual({ n: 1 });
      expect(event.source).toBe('tests');
      expect(event.priority).toBe(EventPriority.NORMAL);
      expect(event.timestamp).toBeInstanceOf(Date);
      expect(Object.isFrozen(event)).toBe(true);
    });

    it('should evict the oldest event past capacity', () => {
      const small = new PluginEventBus({ historySize: 3, logger });
      for (let i = 0; i < 4; i++) small.publishSync(`e${i}`, {});
      expect(small.history(undefined, 10).map((e) => e.name)).toEqual(['e1', 'e2', 'e3']);
    });

    it('should filter by name and return the most recent last', () => {
      bus.publishSync('a', { n: 1 });
      bus.publishSync('b', { n: 2 });
      bus.publishSync('a', { n: 3 });
      bus.publishSync('c', { n: 4 });

      expect(bus.history('a').map((e) => e.data.n)).toEqual([1, 3]);
      expect(bus.history(undefined, 2).map((e) => e.name)).toEqual(['a', 'c']);
      expect(bus.history(undefined, 0)).toEqual([]);
    });

    it('should treat a NaN limit as empty and an infinite one as everything', () => {
      for (let i = 0; i < 12; i++) bus.publishSync('tick', { i });
      expect(bus.history(undefined, Number.NaN)).toEqual([]);
      expect(bus.history('tick', Number.POSITIVE_INFINITY)).toHaveLength(12);
    });

    it('should default to the last 10 events', () => {
      for (let i = 0; i < 15; i++) bus.publishSync('tick', { i });
      const recent = bus.history();
      expect(recent).toHaveLength(10);
      expect(recent[0].data.i).toBe(5);
      expect(recent[9].data.i).toBe(14);
    });

    it('should clear history', () => {
      bus.publishSync('a', {});
      bus.clearHistory();
      expect(bus.history()).toEqual([]);
    });

    it('should reject a non-positive capacity', () => {
      expect(() => new PluginEventBus({ historySize: 0, logger })).toThrow(/positive integer/);
    });
  });

  describe('publishAsync', () => {
    it('should run handlers concurrently', async () => {
      const order: string[] = [];
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => { release = resolve; });

      bus.subscribe('e', async () => {
        await gate;
        order.push('waiter');
      }, EventPriority.HIGH);
      bus.subscribe('e', () => {
        order.push('releaser');
        release();
      });

      await bus.publishAsync('e', {});
      expect(order).toEqual(['releaser', 'waiter']);
    });

    it('should start handlers in priority order', async () => {
      const started: string[] = [];
      bus.subscribe('e', () => { started.push('low'); }, EventPriority.LOW);
      bus.subscribe('e', () => { started.push('critical'); }, EventPriority.CRITICAL);
      await bus.publishAsync('e', {});
      expect(started).toEqual(['critical', 'low']);
    });

    it('should swallow handler failures', async () => {
      const ok = vi.fn();
      bus.subscribe('e', async () => { throw new Error('async boom'); });
      bus.subscribe('e', () => { throw new Error('sync boom'); });
      bus.subscribe('e', ok);

      await expect(bus.publishAsync('e', {})).resolves.toBeUndefined();
      expect(ok).toHaveBeenCalledOnce();
      expect(logger.error).toHaveBeenCalledTimes(2);
    });

    it('should handle publish with no listeners gracefully', async () => {
      await expect(bus.publishAsync('e', { x: 1 })).resolves.toBeUndefined();
      expect(bus.history('e')).toHaveLength(1);
    });
  });

  describe('publish', () => {
    it('should record immediately and dispatch without blocking the caller', async () => {
      const handler = vi.fn();
      bus.subscribe('e', handler);

      bus.publish('e', { n: 1 });
      expect(handler).not.toHaveBeenCalled();
      expect(bus.history('e')).toHaveLength(1);

      await flush();
      expect(handler).toHaveBeenCalledOnce();
    });
  });

  describe('invalid event names', () => {
    it('should be reported to the caller', async () => {
      expect(() => bus.subscribe('', vi.fn())).toThrow(/Invalid event name/);
      expect(() => bus.publishSync(' ', {})).toThrow(/Invalid event name/);
      expect(() => bus.publish('', {})).toThrow(/Invalid event name/);
      await expect(bus.publishAsync('', {})).rejects.toThrow(/Invalid event name/);
      expect(bus.history()).toEqual([]);
    });
  });

  describe('owners', () => {
    it('should skip bindings of inactive owners', () => {
      const active = new Set(['on']);
      const gated = new PluginEventBus({ logger, isOwnerActive: (owner) => active.has(owner) });
      const onHandler = vi.fn();
      const offHandler = vi.fn();
      const unowned = vi.fn();
      gated.subscribe('e', onHandler, EventPriority.NORMAL, 'on');
      gated.subscribe('e', offHandler, EventPriority.NORMAL, 'off');
      gated.subscribe('e', unowned);

      gated.publishSync('e', {});
      expect(onHandler).toHaveBeenCalledOnce();
      expect(offHandler).not.toHaveBeenCalled();
      expect(unowned).toHaveBeenCalledOnce();

      active.add('off');
      gated.publishSync('e', {});
      expect(offHandler).toHaveBeenCalledOnce();
    });

    it('should remove all bindings of an owner', () => {
      bus.subscribe('a', vi.fn(), EventPriority.NORMAL, 'p1');
      bus.subscribe('b', vi.fn(), EventPriority.NORMAL, 'p1');
      bus.subscribe('b', vi.fn(), EventPriority.NORMAL, 'p2');

      expect(bus.removeOwner('p1')).toBe(2);
      expect(bus.listEvents()).toEqual(['b']);
      expect(bus.countHandlers('b')).toBe(1);
    });
  });

  it('should apply subscriptions made during dispatch from the next publish', () => {
    const late = vi.fn();
    bus.subscribe('e', () => { bus.subscribe('e', late); });
    bus.publishSync('e', {});
    expect(late).not.toHaveBeenCalled();
    bus.publishSync('e', {});
    expect(late).toHaveBeenCalledOnce();
  });

  it('should clear all handlers', () => {
    bus.subscribe('a', vi.fn());
    bus.subscribe('b', vi.fn());
    bus.clear();
    expect(bus.countHandlers('a')).toBe(0);
    expect(bus.countHandlers('b')).toBe(0);
  });
});
