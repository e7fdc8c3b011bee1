/**
 * Plugin Context & Dependency Injection
 * Creates per-plugin host contexts whose registrations are attributed to
 * the plugin that made them.
 */

import type { CapabilityRegistry } from './capabilities.js';
import type { PluginEventBus } from './events.js';
import type { HookPipeline } from './hooks.js';
import type {
  AsyncHookCallback,
  CapabilityKind,
  CapabilityMap,
  ConfigAccessor,
  EventHandler,
  EventPayload,
  EventPriority,
  FileCapabilityKind,
  HookContext,
  HostContext,
  Logger,
  PluginMetadata,
} from './types.js';

export interface ContextServices {
  logger: Logger;
  config: ConfigAccessor;
  capabilities: CapabilityRegistry;
  events: PluginEventBus;
  hooks: HookPipeline;
}

/**
 * Build the HostContext handed to `initialize`. Registering a capability
 * kind the plugin did not declare is allowed but logged. Once `isLive`
 * turns false, registrations through the context are dropped.
 */
export function createHostContext(
  metadata: PluginMetadata,
  services: ContextServices,
  isLive: () => boolean = () => true,
): HostContext {
  const owner = metadata.name;
  const declared = new Set<string>(metadata.capabilities);
  const logger = services.logger.child({ plugin: owner });
  const { capabilities, events, hooks } = services;

  const accepting = (target: Record<string, unknown>): boolean => {
    if (isLive()) return true;
    logger.warn(target, 'Plugin is not active, registration dropped');
    return false;
  };

  return {
    pluginName: owner,
    logger,
    config: services.config,

    capabilities: {
      register<K extends CapabilityKind>(kind: K, record: CapabilityMap[K]): boolean {
        if (!accepting({ kind, name: record.name })) return false;
        if (!declared.has(kind)) {
          logger.warn({ kind, name: record.name }, 'Plugin registers a capability it did not declare');
        }
        return capabilities.register(kind, record, owner);
      },
      lookupForFile<K extends FileCapabilityKind>(kind: K, filePath: string): CapabilityMap[K] | undefined {
        return capabilities.lookupForFile(kind, filePath);
      },
      lookupByName<K extends CapabilityKind>(kind: K, name: string): CapabilityMap[K] | undefined {
        return capabilities.lookupByName(kind, name);
      },
      list<K extends CapabilityKind>(kind: K): CapabilityMap[K][] {
        return capabilities.list(kind);
      },
    },

    events: {
      subscribe(eventName: string, handler: EventHandler, priority?: EventPriority): void {
        if (!accepting({ event: eventName })) return;
        events.subscribe(eventName, handler, priority, owner);
      },
      unsubscribe(eventName: string, handler: EventHandler): void {
        events.unsubscribe(eventName, handler);
      },
      // Events a plugin publishes name it as their source unless told otherwise
      publishSync(eventName: string, data: EventPayload, source: string = owner): void {
        events.publishSync(eventName, data, source);
      },
      publishAsync(eventName: string, data: EventPayload, source: string = owner): Promise<void> {
        return events.publishAsync(eventName, data, source);
      },
      publish(eventName: string, data: EventPayload, source: string = owner): void {
        events.publish(eventName, data, source);
      },
      history(eventName?: string, limit?: number) {
        return events.history(eventName, limit);
      },
    },

    hooks: {
      register<T>(hookPoint: string, callback: AsyncHookCallback<T>, priority?: number): void {
        if (!accepting({ hookPoint })) return;
        hooks.register(hookPoint, callback, priority, owner);
      },
      unregister<T>(hookPoint: string, callback: AsyncHookCallback<T>): void {
        hooks.unregister(hookPoint, callback);
      },
      execute<T>(hookPoint: string, data: T, context?: HookContext): T {
        return hooks.execute(hookPoint, data, context);
      },
      executeAsync<T>(hookPoint: string, data: T, context?: HookContext): Promise<T> {
        return hooks.executeAsync(hookPoint, data, context);
      },
      hasHooks: (hookPoint: string) => hooks.hasHooks(hookPoint),
      countHooks: (hookPoint: string) => hooks.countHooks(hookPoint),
    },
  };
}
