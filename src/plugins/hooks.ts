/**
 * Hook Pipeline
 *
 * Named points in host code through which one value is threaded, callback
 * by callback, highest priority first. A callback's non-null return value
 * replaces the current value; `undefined` keeps it (in-place mutation). A
 * callback that throws is logged and skipped: the value it received carries
 * on to the next callback, and earlier effects are never rolled back.
 */

import { logger as defaultLogger } from '../logger.js';
import type { AsyncHookCallback, HookContext, Hooks, Logger } from './types.js';
import { assertKey, callbackName, isPromiseLike } from './util.js';

interface HookBinding {
  /** The callback as registered, for identity comparison. */
  ref: object;
  name: string;
  priority: number;
  owner?: string;
  invoke: (data: unknown, context: HookContext) => unknown;
}

export interface HookPipelineOptions {
  logger?: Logger;
  /** Bindings whose owner is inactive are skipped when executing. */
  isOwnerActive?: (owner: string) => boolean;
}

export class HookPipeline implements Hooks {
  private hooks = new Map<string, HookBinding[]>();
  private stats = new Map<string, number>();
  private logger: Logger;
  private isOwnerActive: (owner: string) => boolean;

  constructor(opts?: HookPipelineOptions) {
    this.logger = opts?.logger ?? defaultLogger;
    this.isOwnerActive = opts?.isOwnerActive ?? (() => true);
  }

  register<T>(hookPoint: string, callback: AsyncHookCallback<T>, priority = 0, owner?: string): void {
    assertKey('hook point', hookPoint);
    if (!Number.isFinite(priority)) {
      throw new Error(`Hook priority must be a finite number, got ${priority}`);
    }

    const list = this.hooks.get(hookPoint) ?? [];
    list.push({
      ref: callback,
      name: callbackName(callback),
      priority,
      owner,
      // Values at one hook point share a type by contract with the host
      invoke: (data, context) => callback(data as T, context),
    });
    list.sort((a, b) => b.priority - a.priority);
    this.hooks.set(hookPoint, list);
    if (!this.stats.has(hookPoint)) this.stats.set(hookPoint, 0);

    this.logger.debug({ hookPoint, callback: callbackName(callback), priority, owner }, 'Hook registered');
  }

  unregister<T>(hookPoint: string, callback: AsyncHookCallback<T>): void {
    const list = this.hooks.get(hookPoint);
    if (!list) return;

    const remaining = list.filter((b) => b.ref !== callback);
    if (remaining.length === 0) this.hooks.delete(hookPoint);
    else this.hooks.set(hookPoint, remaining);
    this.logger.debug({ hookPoint, callback: callbackName(callback) }, 'Hook unregistered');
  }

  /**
   * Thread `data` through every callback at `hookPoint`, inline. With no
   * callbacks registered the input is returned untouched.
   */
  execute<T>(hookPoint: string, data: T, context: HookContext = {}): T {
    const bindings = this.hooks.get(hookPoint);
    if (!bindings || bindings.length === 0) return data;

    this.count(hookPoint);
    this.logger.debug({ hookPoint, hooks: bindings.length }, 'Executing hooks');

    let current = data;
    for (const binding of this.runnable(bindings)) {
      try {
        const result = binding.invoke(current, context);
        if (isPromiseLike(result)) {
          this.logger.warn(
            { hookPoint, callback: binding.name },
            'Async hook callback ignored by synchronous execute; use executeAsync',
          );
          Promise.resolve(result).catch((err: unknown) => this.callbackFailed(hookPoint, binding, err));
          continue;
        }
        if (result !== undefined && result !== null) current = result as T;
      } catch (err) {
        this.callbackFailed(hookPoint, binding, err);
      }
    }
    return current;
  }

  /**
   * Same contract as `execute`, awaiting each callback before the next one
   * starts. Callbacks never run in parallel: each depends on the previous
   * one's output.
   */
  async executeAsync<T>(hookPoint: string, data: T, context: HookContext = {}): Promise<T> {
    const bindings = this.hooks.get(hookPoint);
    if (!bindings || bindings.length === 0) return data;

    this.count(hookPoint);
    this.logger.debug({ hookPoint, hooks: bindings.length }, 'Executing hooks async');

    let current = data;
    for (const binding of this.runnable(bindings)) {
      try {
        const result = await binding.invoke(current, context);
        if (result !== undefined && result !== null) current = result as T;
      } catch (err) {
        this.callbackFailed(hookPoint, binding, err);
      }
    }
    return current;
  }

  hasHooks(hookPoint: string): boolean {
    return this.countHooks(hookPoint) > 0;
  }

  countHooks(hookPoint: string): number {
    return this.hooks.get(hookPoint)?.length ?? 0;
  }

  listHookPoints(): string[] {
    return [...this.hooks.keys()];
  }

  /** Executions per hook point since the last `clearStats`. */
  getStats(): Record<string, number> {
    return Object.fromEntries(this.stats);
  }

  clearStats(): void {
    this.stats.clear();
    this.logger.debug({}, 'Hook statistics cleared');
  }

  /** Clear one hook point, or every hook point when none is given. */
  clear(hookPoint?: string): void {
    if (hookPoint === undefined) {
      this.hooks.clear();
      this.logger.debug({}, 'All hooks cleared');
      return;
    }
    this.hooks.delete(hookPoint);
    this.logger.debug({ hookPoint }, 'Hooks cleared');
  }

  /** Drop every callback registered by `owner`. Returns how many were removed. */
  removeOwner(owner: string): number {
    let removed = 0;
    for (const [hookPoint, list] of this.hooks) {
      const remaining = list.filter((b) => b.owner !== owner);
      removed += list.length - remaining.length;
      if (remaining.length === 0) this.hooks.delete(hookPoint);
      else this.hooks.set(hookPoint, remaining);
    }
    return removed;
  }

  // --- Internal ---

  private count(hookPoint: string): void {
    this.stats.set(hookPoint, (this.stats.get(hookPoint) ?? 0) + 1);
  }

  /** Snapshot, so registrations made mid-execution apply from the next call. */
  private runnable(bindings: HookBinding[]): HookBinding[] {
    return bindings.filter((b) => b.owner === undefined || this.isOwnerActive(b.owner));
  }

  private callbackFailed(hookPoint: string, binding: HookBinding, err: unknown): void {
    this.logger.error({ err, hookPoint, callback: binding.name, owner: binding.owner }, 'Hook callback failed');
  }
}
