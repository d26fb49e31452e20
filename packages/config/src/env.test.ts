import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@phenoxform/core';
import { maskValue, readRuntimeEnv, requireEnv } from './env.js';

describe('readRuntimeEnv', () => {
  it('should read the pipeline settings', () => {
    expect(readRuntimeEnv({
      BIOPORTAL_API_KEY: 'test-secret',
      ONTOLOGY_DIR: './ontologies',
      LOG_LEVEL: 'debug',
    })).toEqual({
      bioportalApiKey: 'test-secret',
      bioportalUrl: undefined,
      ontologyDir: './ontologies',
      logLevel: 'debug',
    });
  });

  it('should treat blank values as unset', () => {
    expect(readRuntimeEnv({ BIOPORTAL_API_KEY: '  ', LOG_LEVEL: '' })).toEqual({
      bioportalApiKey: undefined,
      bioportalUrl: undefined,
      ontologyDir: undefined,
      logLevel: 'info',
    });
  });

  it('should reject an unknown log level', () => {
    expect(() => readRuntimeEnv({ LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });

  it('should reject a malformed BioPortal URL', () => {
    expect(() => readRuntimeEnv({ BIOPORTAL_URL: 'not a url' })).toThrow(ConfigurationError);
  });
});

describe('requireEnv', () => {
  it('should return the trimmed value', () => {
    process.env.PHENOXFORM_TEST_VALUE = '  value  ';
    expect(requireEnv('PHENOXFORM_TEST_VALUE')).toBe('value');
    delete process.env.PHENOXFORM_TEST_VALUE;
  });

  it('should throw for a missing value', () => {
    expect(() => requireEnv('PHENOXFORM_TEST_ABSENT')).toThrow(ConfigurationError);
  });
});

describe('maskValue', () => {
  it('should mask short values entirely', () => {
    expect(maskValue('abc')).toBe('***');
  });

  it('should keep four characters at each end of longer values', () => {
    expect(maskValue('test-secret-value')).toBe('test...alue');
  });
});
