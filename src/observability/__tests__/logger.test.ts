import { afterEach, describe, it, expect } from 'vitest';
import { createDocumentLogger, createLogger, getLogLevel } from '../logger';

describe('getLogLevel', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    process.env.LOG_LEVEL = original;
  });

  it('accepts known levels in any case', () => {
    process.env.LOG_LEVEL = 'WARN';
    expect(getLogLevel()).toBe('warn');
    process.env.LOG_LEVEL = 'silent';
    expect(getLogLevel()).toBe('silent');
  });

  it('falls back to info', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(getLogLevel()).toBe('info');
  });
});

describe('createDocumentLogger', () => {
  it('binds the module, document and run', () => {
    const log = createDocumentLogger(createLogger('pipeline/documentPipeline'), {
      documentId: 'doc-1',
      runId: 'run-1',
    });
    expect(log.bindings()).toMatchObject({
      module: 'pipeline/documentPipeline',
      documentId: 'doc-1',
      runId: 'run-1',
    });
  });
});
