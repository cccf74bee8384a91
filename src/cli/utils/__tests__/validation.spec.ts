import { InvalidArgumentError } from 'commander';
import {
  formatValidationError,
  parsePositiveInt,
  validateApiKey,
  validateQueryString,
  validateStartUrl,
} from '../validation.js';
import { EmbeddingBatchError, IndexNotFoundError, IndexUploadError, ValidationError } from '../../../utils/errors.js';

describe('CLI validation', () => {
  it('checks the API key shape', () => {
    expect(() => validateApiKey('')).toThrow('OpenAI API key cannot be empty');
    expect(() => validateApiKey('test-secret-placeholder')).toThrow('OpenAI API key should start with "sk-"');
    expect(() => validateApiKey('sk-short')).toThrow('OpenAI API key appears to be too short');
    expect(() => validateApiKey('sk-test-secret-placeholder')).not.toThrow();
  });

  it('checks queries', () => {
    expect(() => validateQueryString('  ')).toThrow(ValidationError);
    expect(() => validateQueryString('x'.repeat(1001))).toThrow('Query is too long (max: 1000 characters)');
    expect(() => validateQueryString('What is a plan?')).not.toThrow();
  });

  it('checks start URLs', () => {
    expect(() => validateStartUrl('not a url')).toThrow('Invalid start URL: not a url');
    expect(() => validateStartUrl('ftp://ex.org')).toThrow('Start URL must use http or https');
    expect(() => validateStartUrl('https://ex.org')).not.toThrow();
  });

  it('parses positive integers for options', () => {
    const parse = parsePositiveInt('top-k');
    expect(parse('7')).toBe(7);
    expect(() => parse('0')).toThrow(InvalidArgumentError);
    expect(() => parse('2.5')).toThrow('top-k must be a positive integer');
  });

  it('formats errors with hints', () => {
    expect(formatValidationError(new ValidationError('bad'))).toBe('❌ Validation Error: bad');
    expect(formatValidationError(new IndexNotFoundError('idx')))
      .toBe('❌ Index not found: idx. Run "ndis-rag build-index" first.');
    expect(formatValidationError(new EmbeddingBatchError('batch 2 failed', 2, [16, 32])))
      .toBe('❌ Embedding failed, index left untouched: batch 2 failed');
    expect(formatValidationError(new IndexUploadError('2 of 3 documents failed to upload', ['a', 'b'])))
      .toBe('❌ 2 of 3 documents failed to upload (e.g. a, b)');
    expect(formatValidationError('plain')).toBe('❌ Unknown error: plain');
  });
});
