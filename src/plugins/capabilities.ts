/**
 * Capability Registry
 * Per-kind name → implementation tables. Analyzers and extractors are also
 * looked up by file extension, in registration order.
 */

import path from 'path';

import { logger as defaultLogger } from '../logger.js';
import type { CapabilityKind, CapabilityMap, CapabilityRegistrar, FileCapabilityKind, Logger } from './types.js';

type CapabilityTables = { [K in CapabilityKind]: Map<string, CapabilityMap[K]> };

/** `"CSV"`, `"csv"` and `".csv"` all normalize to `".csv"`. */
export function normalizeFormat(format: string): string {
  const lower = format.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/** Lower-cased extension with its leading dot, or `''` when there is none. */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function acceptsFile(supportedFormats: readonly string[], filePath: string): boolean {
  const ext = fileExtension(filePath);
  if (!ext) return false;
  return supportedFormats.some((format) => normalizeFormat(format) === ext);
}

export class CapabilityRegistry implements CapabilityRegistrar {
  private tables: CapabilityTables = {
    analyzer: new Map(),
    extractor: new Map(),
    evaluator: new Map(),
    intelligence: new Map(),
  };
  private owners = new Map<string, string>();
  private logger: Logger;

  constructor(opts?: { logger?: Logger }) {
    this.logger = opts?.logger ?? defaultLogger;
  }

  /**
   * First registration of a name wins, except for analyzers, which are
   * replaced (with a warning) so they can be swapped at runtime.
   * Returns whether the record is now registered.
   */
  register<K extends CapabilityKind>(kind: K, record: CapabilityMap[K], owner?: string): boolean {
    if (typeof record?.name !== 'string' || record.name === '') {
      throw new Error(`Cannot register ${kind}: record has no name`);
    }

    const table: Map<string, CapabilityMap[K]> = this.tables[kind];
    const { name } = record;

    if (table.has(name)) {
      if (kind !== 'analyzer') {
        this.logger.warn({ kind, name, owner }, 'Capability already registered, skipping');
        return false;
      }
      this.logger.warn({ kind, name, owner }, 'Analyzer already registered, replacing');
    }

    table.set(name, record);
    const key = ownerKey(kind, name);
    if (owner) this.owners.set(key, owner);
    else this.owners.delete(key);

    this.logger.info({ kind, name, owner }, 'Capability registered');
    return true;
  }

  /** First record (in registration order) accepting the file's extension. */
  lookupForFile<K extends FileCapabilityKind>(kind: K, filePath: string): CapabilityMap[K] | undefined {
    const table: Map<string, CapabilityMap[K]> = this.tables[kind];
    for (const record of table.values()) {
      if (acceptsFile(record.supportedFormats, filePath)) return record;
    }
    this.logger.debug({ kind, filePath }, 'No capability accepts file');
    return undefined;
  }

  lookupByName<K extends CapabilityKind>(kind: K, name: string): CapabilityMap[K] | undefined {
    const table: Map<string, CapabilityMap[K]> = this.tables[kind];
    return table.get(name);
  }

  /** First intelligence enhancer declaring the given capability tag. */
  getIntelligencePlugin(capability: string): CapabilityMap['intelligence'] | undefined {
    for (const enhancer of this.tables.intelligence.values()) {
      if (enhancer.capability === capability) return enhancer;
    }
    return undefined;
  }

  list<K extends CapabilityKind>(kind: K): CapabilityMap[K][] {
    const table: Map<string, CapabilityMap[K]> = this.tables[kind];
    return [...table.values()];
  }

  /** Plugin that registered the record, when it came through a host context. */
  ownerOf(kind: CapabilityKind, name: string): string | undefined {
    return this.owners.get(ownerKey(kind, name));
  }

  /** Empty every table (tests only). */
  clear(): void {
    for (const table of Object.values(this.tables)) table.clear();
    this.owners.clear();
  }
}

function ownerKey(kind: CapabilityKind, name: string): string {
  return `${kind}:${name}`;
}
