/**
 * Plugin Manager
 * Discovers, initializes and supervises plugins. Owns the event bus, hook
 * pipeline and capability registries that plugins register into.
 *
 * Per plugin: discovered → instantiated → initialized → active ⇄ disabled → shutdown.
 * Nothing here throws for a misbehaving plugin: load, initialize, shutdown
 * and health-check failures are logged and isolated to that plugin.
 */

import fg from 'fast-glob';
import fs from 'fs';
import { pathToFileURL } from 'url';

import { logger as defaultLogger } from '../logger.js';
import { createConfigAccessor } from '../host-config.js';
import { createAnalysisResult, runAnalyzer } from './analysis.js';
import { CapabilityRegistry } from './capabilities.js';
import { createHostContext } from './context.js';
import { PluginEventBus } from './events.js';
import { HookPipeline } from './hooks.js';
import {
  HookPoint,
  PluginMetadataSchema,
  RuntimeEvents,
  type AnalysisOptions,
  type AnalysisResult,
  type Analyzer,
  type ConfigAccessor,
  type Evaluator,
  type Extractor,
  type HostContext,
  type IntelligenceEnhancer,
  type Logger,
  type Plugin,
  type PluginInfo,
  type PluginMetadata,
  type PluginState,
} from './types.js';

export const DEFAULT_PLUGIN_PATTERN = '*-plugin.{js,mjs}';

/** Exported classes whose name ends with this are treated as plugins. */
export const PLUGIN_CLASS_SUFFIX = 'Plugin';

const INIT_TIMEOUT_MS = 30_000;

/** Source recorded on events the manager publishes itself. */
const RUNTIME_SOURCE = 'runtime';

export interface PluginManagerOptions {
  config?: ConfigAccessor;
  logger?: Logger;
  /** Event history capacity. */
  historySize?: number;
  /** Upper bound on a plugin's `initialize`. */
  initTimeoutMs?: number;
}

interface ManagedPlugin {
  plugin: Plugin;
  metadata: PluginMetadata;
  state: PluginState;
  source: string | null;
}

/** What `pre_analysis` callbacks receive and may rewrite. */
export interface AnalysisRequest {
  filePath: string;
  options: AnalysisOptions;
}

type PluginConstructor = new () => unknown;

/** Only `class` declarations count, never plain functions with a matching name. */
function isPluginConstructor(value: unknown): value is PluginConstructor {
  return (
    typeof value === 'function' &&
    value.name.endsWith(PLUGIN_CLASS_SUFFIX) &&
    /^class\b/.test(Function.prototype.toString.call(value))
  );
}

/** Structural check for anything a plugin file hands us. */
export function isPlugin(value: unknown): value is Plugin {
  return (
    typeof value === 'object' &&
    value !== null &&
    'metadata' in value &&
    PluginMetadataSchema.safeParse(value.metadata).success &&
    'initialize' in value &&
    typeof value.initialize === 'function' &&
    'shutdown' in value &&
    typeof value.shutdown === 'function' &&
    'healthCheck' in value &&
    typeof value.healthCheck === 'function'
  );
}

export class PluginManager {
  readonly events: PluginEventBus;
  readonly hooks: HookPipeline;
  readonly capabilities: CapabilityRegistry;

  private plugins = new Map<string, ManagedPlugin>();
  private initializing = new Set<string>();
  private config: ConfigAccessor;
  private logger: Logger;
  private initTimeoutMs: number;

  constructor(options: PluginManagerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.config = options.config ?? createConfigAccessor();
    this.initTimeoutMs = options.initTimeoutMs ?? INIT_TIMEOUT_MS;

    // Callbacks run while their plugin initializes or is active; unknown owners never run
    const isOwnerActive = (owner: string) =>
      this.initializing.has(owner) || this.plugins.get(owner)?.state === 'active';

    this.events = new PluginEventBus({ historySize: options.historySize, logger: this.logger, isOwnerActive });
    this.hooks = new HookPipeline({ logger: this.logger, isOwnerActive });
    this.capabilities = new CapabilityRegistry({ logger: this.logger });

    this.logger.debug({}, 'Plugin manager initialized');
  }

  // --- Discovery ---

  /**
   * Load every file in `dir` whose name matches `pattern`. Each file is
   * isolated: one that fails to import, or whose plugins fail to
   * initialize, does not stop the others. Returns the registered names.
   */
  async loadFromDirectory(dir: string, pattern: string = DEFAULT_PLUGIN_PATTERN): Promise<string[]> {
    if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
      this.logger.warn({ dir }, 'Plugin directory does not exist');
      return [];
    }

    const files = (await fg(pattern, { cwd: dir, onlyFiles: true, deep: 1, absolute: true })).sort();

    this.logger.info({ dir, pattern, files: files.length }, 'Searching for plugins');

    const loaded: string[] = [];
    for (const file of files) {
      try {
        loaded.push(...(await this.loadPluginFile(file)));
      } catch (err) {
        this.logger.error({ err, file }, 'Failed to load plugin file');
      }
    }
    return loaded;
  }

  /** Import one file and register every plugin class it exports. */
  async loadPluginFile(file: string): Promise<string[]> {
    this.logger.debug({ file }, 'Loading plugin file');
    const mod: Record<string, unknown> = await import(pathToFileURL(file).href);

    // A class exported both as default and by name is instantiated once
    const classes = [...new Set(Object.values(mod).filter(isPluginConstructor))];
    if (classes.length === 0) {
      this.logger.warn({ file }, 'No plugin class found');
      return [];
    }

    const registered: string[] = [];
    for (const PluginClass of classes) {
      let instance: unknown;
      try {
        instance = new PluginClass();
      } catch (err) {
        this.logger.error({ err, file, pluginClass: PluginClass.name }, 'Failed to instantiate plugin');
        continue;
      }

      if (!isPlugin(instance)) {
        this.logger.warn(
          { file, pluginClass: PluginClass.name },
          'Invalid plugin: needs valid metadata plus initialize, shutdown and healthCheck',
        );
        continue;
      }

      if (await this.registerPlugin(instance, file)) {
        registered.push(instance.metadata.name);
      }
    }
    return registered;
  }

  // --- Registration ---

  /**
   * Initialize and add a plugin. Duplicate names, invalid metadata and
   * failing initializers are rejected softly: logged, `false` returned.
   */
  async registerPlugin(plugin: Plugin, source: string | null = null): Promise<boolean> {
    const parsed = PluginMetadataSchema.safeParse(plugin.metadata);
    if (!parsed.success) {
      this.logger.warn({ source, issues: parsed.error.issues }, 'Invalid plugin metadata, skipping');
      return false;
    }

    const metadata = parsed.data;
    const { name } = metadata;

    if (this.plugins.has(name) || this.initializing.has(name)) {
      this.logger.warn({ plugin: name, source }, 'Plugin already registered, skipping');
      return false;
    }

    // Cleared on failure: a timed-out initialize may keep using its context
    let live = true;
    this.initializing.add(name);
    try {
      const ctx = createHostContext(
        metadata,
        {
          logger: this.logger,
          config: this.config,
          capabilities: this.capabilities,
          events: this.events,
          hooks: this.hooks,
        },
        () => live,
      );
      await this.initializeWithTimeout(plugin, ctx, name);
    } catch (err) {
      live = false;
      const revoked = this.events.removeOwner(name) + this.hooks.removeOwner(name);
      this.logger.error({ err, plugin: name, source, revoked }, 'Failed to initialize plugin');
      return false;
    } finally {
      this.initializing.delete(name);
    }

    metadata.loadedAt = new Date();
    this.plugins.set(name, {
      plugin,
      metadata,
      state: metadata.enabled ? 'active' : 'disabled',
      source,
    });

    this.logger.info(
      { plugin: name, version: metadata.version, capabilities: metadata.capabilities },
      `Plugin registered: ${name} v${metadata.version}`,
    );
    this.events.publishSync(RuntimeEvents.PLUGIN_LOADED, { plugin: name }, RUNTIME_SOURCE);
    return true;
  }

  // --- Queries ---

  getPlugin(name: string): Plugin | undefined {
    return this.plugins.get(name)?.plugin;
  }

  getState(name: string): PluginState | undefined {
    return this.plugins.get(name)?.state;
  }

  /** A copy; mutate through enablePlugin / disablePlugin. */
  getMetadata(name: string): PluginMetadata | undefined {
    const managed = this.plugins.get(name);
    if (!managed) return undefined;
    const { metadata } = managed;
    return { ...metadata, capabilities: [...metadata.capabilities], dependencies: [...metadata.dependencies] };
  }

  /** All registered plugins, in registration order. */
  listPlugins(): PluginInfo[] {
    return [...this.plugins.values()].map(({ metadata, state, source }) => ({
      name: metadata.name,
      version: metadata.version,
      author: metadata.author,
      description: metadata.description,
      capabilities: [...metadata.capabilities],
      dependencies: [...metadata.dependencies],
      enabled: metadata.enabled,
      state,
      loadedAt: metadata.loadedAt ? metadata.loadedAt.toISOString() : null,
      source,
    }));
  }

  listAnalyzers(): Array<{ name: string; version: string; description: string; formats: string[]; owner: string | null }> {
    return this.capabilities.list('analyzer').map((analyzer) => ({
      name: analyzer.name,
      version: analyzer.version ?? '1.0.0',
      description: analyzer.description ?? `${analyzer.name} analyzer`,
      formats: [...analyzer.supportedFormats],
      owner: this.capabilities.ownerOf('analyzer', analyzer.name) ?? null,
    }));
  }

  getAnalyzerFor(filePath: string): Analyzer | undefined {
    return this.capabilities.lookupForFile('analyzer', filePath);
  }

  getExtractorFor(filePath: string): Extractor | undefined {
    return this.capabilities.lookupForFile('extractor', filePath);
  }

  getEvaluator(name: string): Evaluator | undefined {
    return this.capabilities.lookupByName('evaluator', name);
  }

  getIntelligencePlugin(capability: string): IntelligenceEnhancer | undefined {
    return this.capabilities.getIntelligencePlugin(capability);
  }

  // --- Enable / disable ---

  /** Re-activate a disabled plugin's event handlers and hook callbacks. */
  enablePlugin(name: string): boolean {
    return this.setEnabled(name, true);
  }

  /**
   * Stop dispatching to the plugin's event handlers and hook callbacks. Its
   * capability records stay registered.
   */
  disablePlugin(name: string): boolean {
    return this.setEnabled(name, false);
  }

  private setEnabled(name: string, enabled: boolean): boolean {
    const managed = this.plugins.get(name);
    if (!managed) {
      this.logger.warn({ plugin: name }, 'Unknown plugin');
      return false;
    }
    if (managed.state === 'shutdown') {
      this.logger.warn({ plugin: name }, 'Plugin is shut down');
      return false;
    }

    managed.metadata.enabled = enabled;
    managed.state = enabled ? 'active' : 'disabled';
    this.logger.info({ plugin: name }, enabled ? 'Plugin enabled' : 'Plugin disabled');
    this.events.publishSync(
      enabled ? RuntimeEvents.PLUGIN_ENABLED : RuntimeEvents.PLUGIN_DISABLED,
      { plugin: name },
      RUNTIME_SOURCE,
    );
    return true;
  }

  // --- Shutdown & health ---

  /** Shut every plugin down, in registration order. Safe to call twice. */
  async shutdownAll(): Promise<void> {
    this.logger.info({ plugins: this.plugins.size }, 'Shutting down all plugins');

    for (const [name, managed] of this.plugins) {
      if (managed.state === 'shutdown') continue;
      try {
        await managed.plugin.shutdown();
        this.logger.debug({ plugin: name }, 'Plugin shut down');
      } catch (err) {
        this.logger.error({ err, plugin: name }, 'Error shutting down plugin');
      }
      managed.state = 'shutdown';
    }

    this.logger.info({}, 'All plugins shut down');
  }

  /**
   * Ask every active plugin for its health. A check that throws, rejects or returns
   * anything but `true` counts as unhealthy.
   */
  async healthCheck(): Promise<Record<string, boolean>> {
    const active = [...this.plugins].filter(([, managed]) => managed.state === 'active');

    const results = await Promise.all(
      active.map(async ([name, managed]): Promise<[string, boolean]> => {
        try {
          return [name, (await managed.plugin.healthCheck()) === true];
        } catch (err) {
          this.logger.error({ err, plugin: name }, 'Health check failed');
          return [name, false];
        }
      }),
    );

    return Object.fromEntries(results);
  }

  // --- Host glue ---

  /**
   * Analyze a file with the first analyzer accepting its extension,
   * threading the request through `pre_analysis` and the result through
   * `post_analysis`. Always resolves; problems come back as an error result.
   */
  async analyzeFile(filePath: string, options: AnalysisOptions = {}): Promise<AnalysisResult> {
    const analyzer = this.getAnalyzerFor(filePath);
    if (!analyzer) {
      return createAnalysisResult({ status: 'error', errors: [`No analyzer registered for ${filePath}`] });
    }

    const request = await this.hooks.executeAsync<AnalysisRequest>(
      HookPoint.PRE_ANALYSIS,
      { filePath, options },
      { analyzer: analyzer.name },
    );
    const raw = await runAnalyzer(analyzer, request.filePath, request.options);
    const result = await this.hooks.executeAsync<AnalysisResult>(HookPoint.POST_ANALYSIS, raw, {
      analyzer: analyzer.name,
      filePath: request.filePath,
    });

    await this.events.publishAsync(
      RuntimeEvents.ANALYSIS_COMPLETED,
      { filePath: request.filePath, analyzer: analyzer.name, status: result.status },
      RUNTIME_SOURCE,
    );
    return result;
  }

  // --- Internal ---

  private async initializeWithTimeout(plugin: Plugin, ctx: HostContext, name: string): Promise<void> {
    const timeoutMs = this.initTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        Promise.resolve().then(() => plugin.initialize(ctx)),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Plugin "${name}" initialize() timed out after ${timeoutMs}ms`)),
            timeoutMs,
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
