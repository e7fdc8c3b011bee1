import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CapabilityRegistry, acceptsFile, fileExtension, normalizeFormat } from './capabilities.js';
import { createAnalysisResult } from './analysis.js';
import type { Analyzer, Extractor, IntelligenceEnhancer, Logger } from './types.js';

function makeLogger(): Logger {
  const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn(() => log) };
  return log;
}

function analyzer(name: string, supportedFormats: string[]): Analyzer {
  return {
    name,
    supportedFormats,
    canHandle: (filePath) => acceptsFile(supportedFormats, filePath),
    analyze: () => createAnalysisResult({ status: 'success', data: { by: name } }),
  };
}

function extractor(name: string, supportedFormats: string[]): Extractor {
  return { name, supportedFormats, extract: () => `text from ${name}` };
}

function enhancer(name: string, capability: string): IntelligenceEnhancer {
  return { name, capability, enhance: async (query) => ({ query, by: name }) };
}

describe('format helpers', () => {
  it('should normalize formats to a lower-case dotted extension', () => {
    expect(normalizeFormat('CSV')).toBe('.csv');
    expect(normalizeFormat('.XLSX')).toBe('.xlsx');
    expect(normalizeFormat(' pdf ')).toBe('.pdf');
  });

  it('should read extensions case-insensitively', () => {
    expect(fileExtension('/data/Report.CSV')).toBe('.csv');
    expect(fileExtension('/data/README')).toBe('');
  });

  it('should never accept a file without extension', () => {
    expect(acceptsFile(['.csv'], 'Makefile')).toBe(false);
    expect(acceptsFile(['csv'], 'sales.csv')).toBe(true);
  });
});

describe('CapabilityRegistry', () => {
  let logger: Logger;
  let registry: CapabilityRegistry;

  beforeEach(() => {
    logger = makeLogger();
    registry = new CapabilityRegistry({ logger });
  });

  it('should find an analyzer by extension', () => {
    const excel = analyzer('excel', ['.csv', '.xlsx']);
    registry.register('analyzer', excel);

    expect(registry.lookupForFile('analyzer', 'q3.csv')).toBe(excel);
    expect(registry.lookupForFile('analyzer', 'Q3.XLSX')).toBe(excel);
    expect(registry.lookupForFile('analyzer', 'q3.pdf')).toBeUndefined();
    expect(registry.lookupForFile('analyzer', 'q3')).toBeUndefined();
  });

  it('should prefer the first registered record for a shared extension', () => {
    const first = analyzer('first', ['.csv']);
    registry.register('analyzer', first);
    registry.register('analyzer', analyzer('second', ['csv']));
    expect(registry.lookupForFile('analyzer', 'a.csv')).toBe(first);
  });

  it('should replace an analyzer registered twice under one name', () => {
    const old = analyzer('excel', ['.csv']);
    const replacement = analyzer('excel', ['.xlsx']);
    registry.register('analyzer', old);

    expect(registry.register('analyzer', replacement)).toBe(true);
    expect(registry.lookupByName('analyzer', 'excel')).toBe(replacement);
    expect(registry.list('analyzer')).toEqual([replacement]);
    expect(logger.warn).toHaveBeenCalledWith(
      { kind: 'analyzer', name: 'excel', owner: undefined },
      'Analyzer already registered, replacing',
    );
  });

  it('should keep the first extractor registered under a name', () => {
    const first = extractor('pdf', ['.pdf']);
    registry.register('extractor', first);

    expect(registry.register('extractor', extractor('pdf', ['.docx']))).toBe(false);
    expect(registry.lookupByName('extractor', 'pdf')).toBe(first);
    expect(registry.lookupForFile('extractor', 'notes.docx')).toBeUndefined();
  });

  it('should keep separate namespaces per kind', () => {
    registry.register('analyzer', analyzer('shared', ['.csv']));
    expect(registry.register('extractor', extractor('shared', ['.csv']))).toBe(true);
    expect(registry.list('analyzer')).toHaveLength(1);
    expect(registry.list('extractor')).toHaveLength(1);
  });

  it('should look evaluators up by name', () => {
    const evaluator = { name: 'rag', metrics: ['faithfulness'], evaluate: () => createAnalysisResult({ status: 'success' }) };
    registry.register('evaluator', evaluator);
    expect(registry.lookupByName('evaluator', 'rag')).toBe(evaluator);
    expect(registry.lookupByName('evaluator', 'other')).toBeUndefined();
  });

  it('should find intelligence enhancers by capability tag', () => {
    const planner = enhancer('planner', 'query_planning');
    registry.register('intelligence', enhancer('crag', 'corrective_rag'));
    registry.register('intelligence', planner);

    expect(registry.getIntelligencePlugin('query_planning')).toBe(planner);
    expect(registry.getIntelligencePlugin('self_reflection')).toBeUndefined();
  });

  it('should list records in registration order', () => {
    registry.register('analyzer', analyzer('b', ['.b']));
    registry.register('analyzer', analyzer('a', ['.a']));
    expect(registry.list('analyzer').map((a) => a.name)).toEqual(['b', 'a']);
  });

  it('should remember which plugin registered a record', () => {
    registry.register('analyzer', analyzer('excel', ['.csv']), 'excel-plugin');
    registry.register('analyzer', analyzer('plain', ['.txt']));
    expect(registry.ownerOf('analyzer', 'excel')).toBe('excel-plugin');
    expect(registry.ownerOf('analyzer', 'plain')).toBeUndefined();
  });

  it('should refuse a record without a name', () => {
    expect(() => registry.register('analyzer', analyzer('', ['.csv']))).toThrow(
      'Cannot register analyzer: record has no name',
    );
  });

  it('should empty every table on clear', () => {
    registry.register('analyzer', analyzer('excel', ['.csv']), 'p');
    registry.register('extractor', extractor('pdf', ['.pdf']));
    registry.clear();
    expect(registry.list('analyzer')).toEqual([]);
    expect(registry.list('extractor')).toEqual([]);
    expect(registry.ownerOf('analyzer', 'excel')).toBeUndefined();
  });
});
