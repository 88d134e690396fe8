import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  TopologyError,
  FileAccessError,
  OutputError,
  ConfigurationError,
  getErrorCode,
  toError,
} from '../../src/utils/errors.js';

describe('TopologyError', () => {
  it('should create error with code and message', () => {
    const error = new TopologyError(ErrorCode.INVALID_PARAMETER, 'Bad parameter');

    expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(error.message).toBe('Bad parameter');
    expect(error.name).toBe('TopologyError');
    expect(error.recoverable).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('should include context and cause', () => {
    const cause = new Error('EACCES');
    const error = new TopologyError(ErrorCode.FILE_READ_FAILED, 'Cannot read', {
      cause,
      context: { filePath: 'lssea_a.log' },
      recoverable: true,
    });

    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ filePath: 'lssea_a.log' });
    expect(error.recoverable).toBe(true);
  });

  it('should serialize to JSON correctly', () => {
    const error = new TopologyError(ErrorCode.CONFIG_INVALID, 'Invalid config');
    const json = error.toJSON();

    expect(json.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(json.message).toBe('Invalid config');
    expect(json.recoverable).toBe(false);
    expect(json.timestamp).toBeInstanceOf(Date);
  });

  it('should wrap a plain error', () => {
    const original = new Error('Something went wrong');
    const wrapped = TopologyError.fromError(original);

    expect(wrapped.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(wrapped.message).toBe('Something went wrong');
    expect(wrapped.cause).toBe(original);
  });

  it('should return same error if already TopologyError', () => {
    const original = new OutputError(ErrorCode.OUTPUT_WRITE_FAILED, 'Disk full');

    expect(TopologyError.fromError(original)).toBe(original);
  });
});

describe('FileAccessError', () => {
  it('should be recoverable for a single unreadable file', () => {
    const error = new FileAccessError(ErrorCode.FILE_READ_FAILED, 'Cannot read');

    expect(error.name).toBe('FileAccessError');
    expect(error.recoverable).toBe(true);
  });

  it('should not be recoverable for a missing input directory', () => {
    expect(new FileAccessError(ErrorCode.INPUT_DIR_MISSING, 'No dir').recoverable).toBe(false);
  });
});

describe('ConfigurationError', () => {
  it('should carry CONFIG_INVALID', () => {
    const error = new ConfigurationError('Bad scope');

    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.recoverable).toBe(false);
  });
});

describe('getErrorCode', () => {
  it('should return the code of a TopologyError', () => {
    expect(getErrorCode(new ConfigurationError('x'))).toBe(ErrorCode.CONFIG_INVALID);
  });

  it('should return UNKNOWN_ERROR otherwise', () => {
    expect(getErrorCode(new Error('x'))).toBe(ErrorCode.UNKNOWN_ERROR);
  });
});

describe('toError', () => {
  it('should keep errors and wrap other values', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});
