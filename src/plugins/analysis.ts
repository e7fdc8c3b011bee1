/**
 * Analysis results and the analyzer base class.
 */

import fs from 'fs';

import { acceptsFile, fileExtension } from './capabilities.js';
import type { AnalysisOptions, AnalysisResult, AnalysisStatus, Analyzer } from './types.js';

export function createAnalysisResult(
  init: { status: AnalysisStatus } & Partial<AnalysisResult>,
): AnalysisResult {
  return {
    data: {},
    metadata: {},
    errors: [],
    warnings: [],
    executionTimeMs: 0,
    ...init,
  };
}

export function isSuccess(result: AnalysisResult): boolean {
  return result.status === 'success';
}

export function hasErrors(result: AnalysisResult): boolean {
  return result.errors.length > 0;
}

export interface FileValidation {
  valid: boolean;
  error?: string;
}

/**
 * Convenience base for analyzer capabilities. Subclasses supply `name`,
 * `supportedFormats` and `analyze`; `preAnalyze` / `postAnalyze` are
 * optional extension points applied by `runAnalyzer`.
 */
export abstract class BaseAnalyzer implements Analyzer {
  abstract readonly name: string;
  abstract readonly supportedFormats: readonly string[];
  readonly version: string = '1.0.0';

  get description(): string {
    return `${this.name} analyzer`;
  }

  canHandle(filePath: string): boolean {
    return acceptsFile(this.supportedFormats, filePath);
  }

  validate(filePath: string): FileValidation {
    if (!fs.existsSync(filePath)) {
      return { valid: false, error: `File not found: ${filePath}` };
    }
    if (!fs.statSync(filePath).isFile()) {
      return { valid: false, error: `Not a file: ${filePath}` };
    }
    if (!this.canHandle(filePath)) {
      return { valid: false, error: `Unsupported format: ${fileExtension(filePath) || '(none)'}` };
    }
    return { valid: true };
  }

  abstract analyze(filePath: string, options?: AnalysisOptions): AnalysisResult | Promise<AnalysisResult>;

  /** Extra options merged over the caller's before `analyze` runs. */
  preAnalyze(_filePath: string, _options: AnalysisOptions): AnalysisOptions {
    return {};
  }

  postAnalyze(result: AnalysisResult): AnalysisResult {
    return result;
  }
}

/**
 * Run an analyzer without letting it throw. `BaseAnalyzer` subclasses are
 * validated first and get their pre/post steps; the elapsed time is filled
 * in when the analyzer did not report one.
 */
export async function runAnalyzer(
  analyzer: Analyzer,
  filePath: string,
  options: AnalysisOptions = {},
): Promise<AnalysisResult> {
  const started = Date.now();
  const elapsed = () => Date.now() - started;

  try {
    let result: AnalysisResult;
    if (analyzer instanceof BaseAnalyzer) {
      const check = analyzer.validate(filePath);
      if (!check.valid) {
        return createAnalysisResult({
          status: 'error',
          metadata: { analyzer: analyzer.name },
          errors: [check.error ?? `Cannot analyze ${filePath}`],
          executionTimeMs: elapsed(),
        });
      }
      const prepared = { ...options, ...analyzer.preAnalyze(filePath, options) };
      result = analyzer.postAnalyze(await analyzer.analyze(filePath, prepared));
    } else {
      result = await analyzer.analyze(filePath, options);
    }

    return result.executionTimeMs > 0 ? result : { ...result, executionTimeMs: elapsed() };
  } catch (err) {
    return createAnalysisResult({
      status: 'error',
      metadata: { analyzer: analyzer.name },
      errors: [`${analyzer.name} failed: ${err instanceof Error ? err.message : String(err)}`],
      executionTimeMs: elapsed(),
    });
  }
}
