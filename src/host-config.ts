/**
 * Host configuration: a JSON object read once at startup and handed to
 * plugins through a read-only, dotted-path accessor.
 */

import fs from 'fs';
import { z } from 'zod';

import type { ConfigAccessor } from './plugins/types.js';

export const HostConfigSchema = z.record(z.string(), z.unknown());

export type HostConfig = z.infer<typeof HostConfigSchema>;

/** A missing file is an empty configuration; a malformed one is an error. */
export function loadHostConfig(filePath: string): HostConfig {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot parse host config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = HostConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid host config ${filePath}: expected a JSON object`);
  }
  return parsed.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolve(values: HostConfig, key: string): { found: boolean; value: unknown } {
  let current: unknown = values;
  for (const part of key.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return { found: false, value: undefined };
    }
    current = current[part];
  }
  return { found: true, value: current };
}

export function createConfigAccessor(values: HostConfig = {}): ConfigAccessor {
  function get<T>(key: string, fallback: T): T;
  function get(key: string): unknown;
  function get(key: string, fallback?: unknown): unknown {
    const { found, value } = resolve(values, key);
    return found && value !== undefined ? value : fallback;
  }

  return {
    get,
    has: (key) => resolve(values, key).found,
    section(key) {
      const { value } = resolve(values, key);
      return isRecord(value) ? { ...value } : {};
    },
  };
}
