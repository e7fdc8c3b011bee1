/**
 * Event Bus: priority-ordered broadcast with a bounded history.
 *
 * Handlers for one event run highest priority first, ties in subscription
 * order. A failing handler is logged and never reaches the publisher or the
 * handlers after it. Payloads are passed through as-is, not copied.
 */

import { logger as defaultLogger } from '../logger.js';
import {
  EventPriority,
  type EventBus,
  type EventHandler,
  type EventPayload,
  type Logger,
  type PluginEvent,
} from './types.js';
import { assertKey, callbackName, isPromiseLike } from './util.js';

/** Default number of events kept in history. */
const HISTORY_SIZE = 100;

interface HandlerBinding {
  handler: EventHandler;
  priority: EventPriority;
  owner?: string;
}

export interface EventBusOptions {
  historySize?: number;
  logger?: Logger;
  /** Bindings whose owner is inactive are skipped when dispatching. */
  isOwnerActive?: (owner: string) => boolean;
}

export class PluginEventBus implements EventBus {
  private handlers = new Map<string, HandlerBinding[]>();
  private events: PluginEvent[] = [];
  private historySize: number;
  private logger: Logger;
  private isOwnerActive: (owner: string) => boolean;

  constructor(opts?: EventBusOptions) {
    const historySize = opts?.historySize ?? HISTORY_SIZE;
    if (!Number.isInteger(historySize) || historySize < 1) {
      throw new Error(`Event history size must be a positive integer, got ${historySize}`);
    }
    this.historySize = historySize;
    this.logger = opts?.logger ?? defaultLogger;
    this.isOwnerActive = opts?.isOwnerActive ?? (() => true);
  }

  subscribe(eventName: string, handler: EventHandler, priority: EventPriority = EventPriority.NORMAL, owner?: string): void {
    assertKey('event name', eventName);
    const list = this.handlers.get(eventName) ?? [];
    list.push({ handler, priority, owner });
    // Array.prototype.sort is stable, so equal priorities keep subscription order
    list.sort((a, b) => b.priority - a.priority);
    this.handlers.set(eventName, list);
    this.logger.debug({ event: eventName, handler: callbackName(handler), priority, owner }, 'Event handler registered');
  }

  unsubscribe(eventName: string, handler: EventHandler): void {
    const list = this.handlers.get(eventName);
    if (!list) return;

    const remaining = list.filter((b) => b.handler !== handler);
    if (remaining.length === 0) this.handlers.delete(eventName);
    else this.handlers.set(eventName, remaining);
    this.logger.debug({ event: eventName, handler: callbackName(handler) }, 'Event handler removed');
  }

  /** Record the event, then run every handler inline, in priority order. */
  publishSync(eventName: string, data: EventPayload, source?: string): void {
    const event = this.record(eventName, data, source);
    const bindings = this.bindingsFor(eventName);

    if (bindings.length === 0) {
      this.logger.debug({ event: eventName }, 'Event published (no handlers)');
      return;
    }
    this.logger.debug({ event: eventName, handlers: bindings.length }, 'Event published');

    for (const binding of bindings) {
      try {
        const result = binding.handler(data, event);
        if (isPromiseLike(result)) {
          Promise.resolve(result).catch((err: unknown) => this.handlerFailed(eventName, binding, err));
        }
      } catch (err) {
        this.handlerFailed(eventName, binding, err);
      }
    }
  }

  /**
   * Record the event, then start every handler concurrently (in priority
   * order) and resolve once all of them have settled. Never rejects for a
   * handler failure.
   */
  async publishAsync(eventName: string, data: EventPayload, source?: string): Promise<void> {
    const event = this.record(eventName, data, source);
    const bindings = this.bindingsFor(eventName);

    if (bindings.length === 0) {
      this.logger.debug({ event: eventName }, 'Event published async (no handlers)');
      return;
    }
    this.logger.debug({ event: eventName, handlers: bindings.length }, 'Event published async');

    const runs = bindings.map((binding) =>
      Promise.resolve()
        .then(() => binding.handler(data, event))
        .catch((err: unknown) => this.handlerFailed(eventName, binding, err)),
    );

    await Promise.allSettled(runs);
  }

  /**
   * Fire-and-forget: records the event immediately and dispatches on the
   * asynchronous path without making the caller wait.
   */
  publish(eventName: string, data: EventPayload, source?: string): void {
    assertKey('event name', eventName);
    this.publishAsync(eventName, data, source).catch((err: unknown) => {
      this.logger.error({ err, event: eventName }, 'Event dispatch failed');
    });
  }

  /** Most recent events, oldest first. An infinite limit returns all of them. */
  history(eventName?: string, limit = 10): PluginEvent[] {
    if (Number.isNaN(limit) || limit <= 0) return [];
    const filtered = eventName === undefined ? this.events : this.events.filter((e) => e.name === eventName);
    return filtered.slice(-limit);
  }

  clearHistory(): void {
    this.events = [];
    this.logger.debug({}, 'Event history cleared');
  }

  /** Event names that currently have at least one handler. */
  listEvents(): string[] {
    return [...this.handlers.keys()];
  }

  countHandlers(eventName: string): number {
    return this.handlers.get(eventName)?.length ?? 0;
  }

  /** Drop every handler bound by `owner`. Returns how many were removed. */
  removeOwner(owner: string): number {
    let removed = 0;
    for (const [eventName, list] of this.handlers) {
      const remaining = list.filter((b) => b.owner !== owner);
      removed += list.length - remaining.length;
      if (remaining.length === 0) this.handlers.delete(eventName);
      else this.handlers.set(eventName, remaining);
    }
    return removed;
  }

  /** Remove all handlers (useful for cleanup/tests). */
  clear(): void {
    this.handlers.clear();
  }

  // --- Internal ---

  private record(eventName: string, data: EventPayload, source?: string): PluginEvent {
    assertKey('event name', eventName);
    const event: PluginEvent = Object.freeze({
      name: eventName,
      data,
      timestamp: new Date(),
      source,
      priority: EventPriority.NORMAL,
    });

    this.events.push(event);
    if (this.events.length > this.historySize) {
      this.events.splice(0, this.events.length - this.historySize);
    }
    return event;
  }

  /** Snapshot of the bindings to run, so subscriptions made mid-dispatch apply from the next publish. */
  private bindingsFor(eventName: string): HandlerBinding[] {
    const list = this.handlers.get(eventName);
    if (!list) return [];
    return list.filter((b) => b.owner === undefined || this.isOwnerActive(b.owner));
  }

  private handlerFailed(eventName: string, binding: HandlerBinding, err: unknown): void {
    this.logger.error(
      { err, event: eventName, handler: callbackName(binding.handler), owner: binding.owner },
      'Event handler failed',
    );
  }
}
