import { describe, it, expect, vi } from 'vitest';
import {
  CadSessionError,
  OutputDirectoryError,
  ParameterNotFoundError,
  TimeoutError,
  logger,
} from '@cae/utils';
import {
  describeOptimizerError,
  die,
  formatError,
  handleError,
  logError,
} from '../../../src/core/error-handler.js';

describe('formatError', () => {
  it('uses the message of an Error', () => {
    expect(formatError(new Error('rebuild failed'))).toBe('rebuild failed');
  });

  it('passes strings through', () => {
    expect(formatError('plain failure')).toBe('plain failure');
  });

  it('hides messages that mention credentials', () => {
    expect(formatError(new Error('invalid api_key for license server'))).toBe(
      'An error occurred. Please check your configuration and try again.'
    );
    expect(formatError('Bearer test-secret rejected')).toBe(
      'An error occurred. Please check your configuration and try again.'
    );
  });

  it('has a fallback for other values', () => {
    expect(formatError({ code: 1 })).toBe('An unexpected error occurred');
  });
});

describe('describeOptimizerError', () => {
  it('hints at the CAD setup for session errors', () => {
    expect(describeOptimizerError(new CadSessionError('Document not found: /m.FCStd', 'load'))).toBe(
      'Document not found: /m.FCStd (check that the CAD file opens and FREECAD_PYTHON points to a FreeCAD-capable Python, or use --cad mock)'
    );
  });

  it('hints at --output-dir for directory errors', () => {
    expect(describeOptimizerError(new OutputDirectoryError('/ro'))).toBe(
      "Output directory '/ro' is not writable (choose another directory with --output-dir)"
    );
  });

  it('hints at the timeout setting', () => {
    expect(describeOptimizerError(new TimeoutError('FreeCAD bridge timed out after 1000ms', 1000))).toBe(
      'FreeCAD bridge timed out after 1000ms (raise freecad.timeoutMs in config.yaml)'
    );
  });

  it('leaves other errors alone', () => {
    expect(describeOptimizerError(new ParameterNotFoundError('Depth', ['Length']))).toBe(
      "Parameter 'Depth' not found. Available parameters: Length"
    );
  });
});

describe('logError', () => {
  it('redacts sensitive context values', () => {
    const error = new CadSessionError('rebuild failed', 'rebuild');
    logError(error, { command: 'optimize.run', header: 'token=test-secret' });

    expect(logger.error).toHaveBeenCalledWith('CLI error', error, {
      command: 'optimize.run',
      header: '[REDACTED]',
      code: 'CAD_SESSION_ERROR',
      errorContext: { operation: 'rebuild' },
    });
  });
});

describe('handleError', () => {
  it('logs and returns the user-facing message', () => {
    expect(handleError(new Error('boom'), { command: 'optimize.show' })).toBe('boom');
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe('die', () => {
  it('prints the message and exits with status 1', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });

    expect(() => die(new Error('bad range'))).toThrow('process.exit(1)');
    expect(console.error).toHaveBeenCalledWith('Error: bad range');
    expect(exit).toHaveBeenCalledWith(1);
  });
});
