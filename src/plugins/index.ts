/**
 * Plugin System re-exports
 */

export { PluginManager, DEFAULT_PLUGIN_PATTERN, PLUGIN_CLASS_SUFFIX, isPlugin } from './manager.js';
export type { PluginManagerOptions, AnalysisRequest } from './manager.js';
export { PluginEventBus, type EventBusOptions } from './events.js';
export { HookPipeline, type HookPipelineOptions } from './hooks.js';
export { CapabilityRegistry, acceptsFile, fileExtension, normalizeFormat } from './capabilities.js';
export { BaseAnalyzer, createAnalysisResult, hasErrors, isSuccess, runAnalyzer, type FileValidation } from './analysis.js';
export { createHostContext, type ContextServices } from './context.js';
export type {
  Plugin,
  PluginMetadata,
  PluginMetadataInput,
  PluginInfo,
  PluginState,
  HostContext,
  CapabilityKind,
  CapabilityMap,
  CapabilityRegistrar,
  FileCapabilityKind,
  Analyzer,
  Extractor,
  Evaluator,
  IntelligenceEnhancer,
  AnalysisResult,
  AnalysisStatus,
  AnalysisOptions,
  ConfigAccessor,
  EventBus,
  EventHandler,
  EventPayload,
  PluginEvent,
  Hooks,
  HookCallback,
  AsyncHookCallback,
  HookContext,
  Logger,
} from './types.js';
export {
  EventPriority,
  HookPoint,
  PluginCapability,
  PluginMetadataSchema,
  RuntimeEvents,
} from './types.js';
