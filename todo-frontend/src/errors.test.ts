import { describe, expect, it } from 'vitest';
import { AppError, BootstrapError, ConfigError, toBootstrapError } from './errors';

describe('toBootstrapError', () => {
  it('marks configuration problems as misconfiguration', () => {
    const cause = new ConfigError('Invalid configuration: VITE_FIREBASE_APP_ID: Required');
    const error = toBootstrapError(cause);

    expect(error).toBeInstanceOf(BootstrapError);
    expect(error.code).toBe('BACKEND_MISCONFIGURED');
    expect(error.message).toBe('Invalid configuration: VITE_FIREBASE_APP_ID: Required');
    expect(error.cause).toBe(cause);
  });

  it('marks other failures as an unreachable backend', () => {
    const cause = new Error('network down');
    const error = toBootstrapError(cause);

    expect(error.code).toBe('BACKEND_UNREACHABLE');
    expect(error.message).toBe('Remote backend initialization failed: network down');
    expect(error.cause).toBe(cause);
  });

  it('handles non-Error values', () => {
    expect(toBootstrapError('timeout').message).toBe('Remote backend initialization failed: timeout');
  });

  it('passes a BootstrapError through', () => {
    const error = new BootstrapError('already wrapped', 'BACKEND_UNREACHABLE');
    expect(toBootstrapError(error)).toBe(error);
  });
});

describe('AppError', () => {
  it('uses the subclass name and default code', () => {
    const error = new ConfigError('bad');
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('CONFIG_ERROR');
  });
});
