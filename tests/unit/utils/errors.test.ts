/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DestinationConflictError,
  ErrorCodes,
  FileWriteError,
  ManifestLoadError,
  PostCommandError,
  SecurityError,
  SkellyError,
  SystemError,
  TemplateNotFoundError,
  getErrorMessage,
} from '../../../src/utils/errors.js';

describe('SkellyError', () => {
  it('should create error with code and message', () => {
    const error = new SkellyError('X001', 'Test error message');

    expect(error.code).toBe('X001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('SkellyError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON', () => {
    const error = new SkellyError('X001', 'Boom', { file: 'a.txt' });

    expect(error.toJSON()).toEqual({
      name: 'SkellyError',
      code: 'X001',
      message: 'Boom',
      details: { file: 'a.txt' },
    });
  });
});

describe('error subclasses', () => {
  it('should keep their own names and extend SkellyError', () => {
    const errors = [
      new ConfigError(ErrorCodes.CONFIG_LOAD, 'c'),
      new SystemError(ErrorCodes.PARSE_ERROR, 's'),
      new SecurityError(ErrorCodes.PATH_TRAVERSAL, 'p'),
    ];

    expect(errors.map((e) => e.name)).toEqual(['ConfigError', 'SystemError', 'SecurityError']);
    expect(errors.every((e) => e instanceof SkellyError)).toBe(true);
  });
});

describe('TemplateNotFoundError', () => {
  it('should name the template and carry the available ones', () => {
    const error = new TemplateNotFoundError('rust', ['go', 'python']);

    expect(error.message).toBe("Template 'rust' not found");
    expect(error.code).toBe('T001');
    expect(error.templateName).toBe('rust');
    expect(error.available).toEqual(['go', 'python']);
  });
});

describe('DestinationConflictError', () => {
  it('should point at the overwrite option', () => {
    const error = new DestinationConflictError('/work/demo');

    expect(error.message).toBe('Directory /work/demo already exists and is not empty. Use --overwrite to write into it.');
    expect(error.code).toBe('T002');
    expect(error.destination).toBe('/work/demo');
  });
});

describe('FileWriteError', () => {
  it('should record the path and the cause message', () => {
    const error = new FileWriteError('/work/demo/a.txt', 'Failed to write', new Error('EACCES'));

    expect(error.code).toBe('T003');
    expect(error.filePath).toBe('/work/demo/a.txt');
    expect(error.details).toEqual({ filePath: '/work/demo/a.txt', cause: 'EACCES' });
  });
});

describe('ManifestLoadError', () => {
  it('should carry the template directory', () => {
    const error = new ManifestLoadError('/templates/bad', 'Invalid YAML');

    expect(error.code).toBe('T004');
    expect(error.templateDir).toBe('/templates/bad');
  });
});

describe('PostCommandError', () => {
  it('should report the exit code', () => {
    const error = new PostCommandError('git init', 128, 'fatal');

    expect(error.message).toBe('Command exited with code 128: git init');
    expect(error.code).toBe('T005');
  });

  it('should report commands that never started', () => {
    expect(new PostCommandError('nope', null, '').message).toBe('Command failed to start: nope');
  });

  it('should report commands killed by a signal', () => {
    const error = new PostCommandError('npm install', null, '', { signal: 'SIGKILL' });

    expect(error.message).toBe('Command was killed by SIGKILL: npm install');
    expect(error.details).toEqual({ command: 'npm install', exitCode: null, stderr: '', signal: 'SIGKILL' });
  });

  it('should report commands that ran out of time', () => {
    const error = new PostCommandError('npm install', null, '', { signal: 'SIGTERM', timedOut: true });

    expect(error.message).toBe('Command timed out and was killed (SIGTERM): npm install');
  });
});

describe('getErrorMessage', () => {
  it('should read messages from errors only', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('boom')).toBe('Unknown error');
  });
});
