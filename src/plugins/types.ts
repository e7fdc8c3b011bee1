/**
 * Plugin System Types & Metadata Schema
 */

import { z } from 'zod';

// --- Capability enum ---

export const PluginCapability = z.enum([
  'analyzer',
  'extractor',
  'evaluator',
  'transformer',
  'exporter',
  'intelligence',
]);

export type PluginCapability = z.infer<typeof PluginCapability>;

/** Capability kinds that have a registry behind them. */
export type CapabilityKind = keyof CapabilityMap;

// --- Plugin metadata ---

export const PluginMetadataSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  author: z.string().default('unknown'),
  description: z.string().default(''),
  capabilities: z.array(PluginCapability).default([]),
  dependencies: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  loadedAt: z.date().nullable().default(null),
});

export type PluginMetadata = z.infer<typeof PluginMetadataSchema>;

/** What plugin authors write: everything but name and version may be omitted. */
export type PluginMetadataInput = z.input<typeof PluginMetadataSchema>;

// --- Logger interface ---

export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

// --- Configuration ---

export interface ConfigAccessor {
  /** Dotted-path lookup, e.g. `get('excel.pmoMode', false)`. */
  get<T>(key: string, fallback: T): T;
  get(key: string): unknown;
  has(key: string): boolean;
  section(key: string): Record<string, unknown>;
}

// --- Analysis results ---

export type AnalysisStatus = 'success' | 'error' | 'partial';

export interface AnalysisResult {
  status: AnalysisStatus;
  data: Record<string, unknown>;
  metadata: Record<string, unknown>;
  errors: string[];
  warnings: string[];
  executionTimeMs: number;
}

export type AnalysisOptions = Record<string, unknown>;

// --- Capability contracts ---

export interface Analyzer {
  readonly name: string;
  readonly supportedFormats: readonly string[];
  readonly version?: string;
  readonly description?: string;
  canHandle(filePath: string): boolean;
  analyze(filePath: string, options?: AnalysisOptions): AnalysisResult | Promise<AnalysisResult>;
}

export interface Extractor {
  readonly name: string;
  readonly supportedFormats: readonly string[];
  extract(filePath: string): string | Promise<string>;
}

export interface Evaluator {
  readonly name: string;
  readonly metrics: readonly string[];
  evaluate(data: Record<string, unknown>): AnalysisResult | Promise<AnalysisResult>;
}

export interface IntelligenceEnhancer {
  readonly name: string;
  /** e.g. 'corrective_rag', 'query_planning', 'self_reflection' */
  readonly capability: string;
  enhance(query: string, context: Record<string, unknown>): Promise<Record<string, unknown>>;
}

export interface CapabilityMap {
  analyzer: Analyzer;
  extractor: Extractor;
  evaluator: Evaluator;
  intelligence: IntelligenceEnhancer;
}

/** Kinds whose records declare accepted file formats. */
export type FileCapabilityKind = 'analyzer' | 'extractor';

// --- Event Bus ---

export const EventPriority = {
  LOW: 1,
  NORMAL: 2,
  HIGH: 3,
  CRITICAL: 4,
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

export type EventPayload = Record<string, unknown>;

export interface PluginEvent {
  readonly name: string;
  readonly data: EventPayload;
  readonly timestamp: Date;
  readonly source?: string;
  readonly priority: EventPriority;
}

export type EventHandler = (data: EventPayload, event: PluginEvent) => void | Promise<void>;

/** Event names the runtime itself publishes. */
export const RuntimeEvents = {
  PLUGIN_LOADED: 'plugin_loaded',
  PLUGIN_ENABLED: 'plugin_enabled',
  PLUGIN_DISABLED: 'plugin_disabled',
  ANALYSIS_COMPLETED: 'analysis_completed',
} as const;

export interface EventBus {
  subscribe(eventName: string, handler: EventHandler, priority?: EventPriority): void;
  unsubscribe(eventName: string, handler: EventHandler): void;
  publishSync(eventName: string, data: EventPayload, source?: string): void;
  publishAsync(eventName: string, data: EventPayload, source?: string): Promise<void>;
  publish(eventName: string, data: EventPayload, source?: string): void;
  history(eventName?: string, limit?: number): PluginEvent[];
}

// --- Hook Pipeline ---

export const HookPoint = {
  PRE_DOCUMENT_UPLOAD: 'pre_document_upload',
  POST_DOCUMENT_UPLOAD: 'post_document_upload',
  PRE_DOCUMENT_INDEX: 'pre_document_index',
  POST_DOCUMENT_INDEX: 'post_document_index',
  PRE_RAG_SEARCH: 'pre_rag_search',
  POST_RAG_SEARCH: 'post_rag_search',
  PRE_RAG_RERANK: 'pre_rag_rerank',
  POST_RAG_RERANK: 'post_rag_rerank',
  PRE_LLM_CALL: 'pre_llm_call',
  POST_LLM_CALL: 'post_llm_call',
  PRE_PROMPT_BUILD: 'pre_prompt_build',
  POST_PROMPT_BUILD: 'post_prompt_build',
  PRE_ANALYSIS: 'pre_analysis',
  POST_ANALYSIS: 'post_analysis',
  PRE_QUERY_PROCESSING: 'pre_query_processing',
  POST_QUERY_PROCESSING: 'post_query_processing',
  PRE_CHUNKING: 'pre_chunking',
  POST_CHUNKING: 'post_chunking',
  PRE_EXTRACTION: 'pre_extraction',
  POST_EXTRACTION: 'post_extraction',
} as const;

export type HookPoint = (typeof HookPoint)[keyof typeof HookPoint];

export type HookContext = Record<string, unknown>;

/** Returning `undefined` keeps the current value (for in-place mutation). */
export type HookCallback<T> = (data: T, context: HookContext) => T | void;

export type AsyncHookCallback<T> = (data: T, context: HookContext) => T | void | Promise<T | void>;

export interface Hooks {
  register<T>(hookPoint: string, callback: AsyncHookCallback<T>, priority?: number): void;
  unregister<T>(hookPoint: string, callback: AsyncHookCallback<T>): void;
  execute<T>(hookPoint: string, data: T, context?: HookContext): T;
  executeAsync<T>(hookPoint: string, data: T, context?: HookContext): Promise<T>;
  hasHooks(hookPoint: string): boolean;
  countHooks(hookPoint: string): number;
}

// --- Host context ---

export interface CapabilityRegistrar {
  register<K extends CapabilityKind>(kind: K, record: CapabilityMap[K]): boolean;
  lookupForFile<K extends FileCapabilityKind>(kind: K, filePath: string): CapabilityMap[K] | undefined;
  lookupByName<K extends CapabilityKind>(kind: K, name: string): CapabilityMap[K] | undefined;
  list<K extends CapabilityKind>(kind: K): CapabilityMap[K][];
}

/**
 * Passed to `Plugin.initialize`. Every registration made through it is
 * attributed to the plugin, so disabling the plugin silences its callbacks.
 */
export interface HostContext {
  readonly pluginName: string;
  readonly logger: Logger;
  readonly config: ConfigAccessor;
  readonly capabilities: CapabilityRegistrar;
  readonly events: EventBus;
  readonly hooks: Hooks;
}

// --- Plugin interface ---

export interface Plugin {
  metadata: PluginMetadataInput;

  initialize(ctx: HostContext): void | Promise<void>;
  shutdown(): void | Promise<void>;
  healthCheck(): boolean | Promise<boolean>;
}

export type PluginState = 'active' | 'disabled' | 'shutdown';

/** Row returned by `PluginManager.listPlugins`. */
export interface PluginInfo {
  name: string;
  version: string;
  author: string;
  description: string;
  capabilities: PluginCapability[];
  dependencies: string[];
  enabled: boolean;
  state: PluginState;
  loadedAt: string | null;
  source: string | null;
}
