/**
 * Unit tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  MdDigestError,
  GenerationError,
  FileSystemError,
  ErrorCodes,
  createValidationError,
  createFrontMatterError,
  createGenerationError,
  createGenerationUnavailableError,
  createFileSystemError,
} from '../../src/core/errors.js';

describe('MdDigestError', () => {
  it('should create error with message and code', () => {
    const error = new MdDigestError('Test error', ErrorCodes.NOT_FOUND);
    expect(error.message).toBe('Test error');
    expect(error.code).toBe(ErrorCodes.NOT_FOUND);
    expect(error.name).toBe('MdDigestError');
  });

  it('should serialize to JSON correctly', () => {
    const context = { field: 'test' };
    const error = new MdDigestError('Test error', ErrorCodes.NOT_FOUND, context);
    expect(error.toJSON()).toEqual({
      error: 'Test error',
      code: ErrorCodes.NOT_FOUND,
      context,
    });
  });
});

describe('createValidationError', () => {
  it('should include field, message and suggestion', () => {
    const error = createValidationError('overlapTokens', 'too large', 'Lower it');
    expect(error.message).toBe('Validation error: overlapTokens - too large. Suggestion: Lower it');
    expect(error.code).toBe(ErrorCodes.INVALID_PARAMETER);
    expect(error.context).toEqual({ field: 'overlapTokens', suggestion: 'Lower it' });
  });
});

describe('createFrontMatterError', () => {
  it('should carry the reason', () => {
    const error = createFrontMatterError('bad indentation');
    expect(error.code).toBe(ErrorCodes.FRONT_MATTER_PARSE);
    expect(error.context).toEqual({ reason: 'bad indentation' });
  });
});

describe('generation errors', () => {
  it('should prefix the task and default to GENERATION_FAILED', () => {
    const error = createGenerationError('translate', 'boom', { model: 'm' });
    expect(error).toBeInstanceOf(GenerationError);
    expect(error.message).toBe('Generation failed (translate): boom');
    expect(error.code).toBe(ErrorCodes.GENERATION_FAILED);
    expect(error.context).toMatchObject({ task: 'translate', model: 'm' });
  });

  it('should accept a specific code', () => {
    const error = createGenerationError('tags', 'empty', undefined, ErrorCodes.GENERATION_EMPTY);
    expect(error.code).toBe(ErrorCodes.GENERATION_EMPTY);
  });

  it('should report a missing API key as unavailable', () => {
    expect(createGenerationUnavailableError().code).toBe(ErrorCodes.GENERATION_UNAVAILABLE);
  });
});

describe('createFileSystemError', () => {
  it('should map the operation to a code and keep the cause', () => {
    const cause = new Error('ENOENT: no such file or directory');
    const error = createFileSystemError('mark', '/tmp/a.md', cause);

    expect(error).toBeInstanceOf(FileSystemError);
    expect(error.code).toBe(ErrorCodes.MARK_FAILED);
    expect(error.path).toBe('/tmp/a.md');
    expect(error.message).toBe('Failed to mark /tmp/a.md: ENOENT: no such file or directory');
    expect(error.cause).toBe(cause);
  });

  it('should use FILE_READ and FILE_WRITE for reads and writes', () => {
    expect(createFileSystemError('read', 'a', 'x').code).toBe(ErrorCodes.FILE_READ);
    expect(createFileSystemError('write', 'a', 'x').code).toBe(ErrorCodes.FILE_WRITE);
  });
});
