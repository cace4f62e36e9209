import { describe, expect, it } from 'vitest';
import { loadConfig, readLogLevel } from './config';
import { ConfigError } from './errors';

const validEnv = {
  VITE_FIREBASE_API_KEY: 'test-api-key',
  VITE_FIREBASE_AUTH_DOMAIN: 'todo-test.firebaseapp.com',
  VITE_FIREBASE_PROJECT_ID: 'todo-test',
  VITE_FIREBASE_APP_ID: 'test-app-id'
};

describe('loadConfig', () => {
  it('maps the environment onto Firebase options with defaults', () => {
    expect(loadConfig(validEnv)).toEqual({
      firebase: {
        apiKey: 'test-api-key',
        authDomain: 'todo-test.firebaseapp.com',
        projectId: 'todo-test',
        storageBucket: undefined,
        messagingSenderId: undefined,
        appId: 'test-app-id'
      },
      seedTodos: false
    });
  });

  it('reads the optional settings', () => {
    const config = loadConfig({
      ...validEnv,
      VITE_FIREBASE_STORAGE_BUCKET: 'todo-test.appspot.com',
      VITE_SEED_TODOS: 'true'
    });
    expect(config.firebase.storageBucket).toBe('todo-test.appspot.com');
    expect(config.seedTodos).toBe(true);
  });

  it('still loads when the log level is not recognised', () => {
    const config = loadConfig({ ...validEnv, VITE_LOG_LEVEL: 'verbose' });
    expect(config.firebase.projectId).toBe('todo-test');
    expect(readLogLevel({ ...validEnv, VITE_LOG_LEVEL: 'verbose' })).toBe('info');
  });

  it('throws a ConfigError naming the missing variable', () => {
    const { VITE_FIREBASE_API_KEY: _omitted, ...env } = validEnv;
    expect(() => loadConfig(env)).toThrow(ConfigError);
    expect(() => loadConfig(env)).toThrow('Invalid configuration: VITE_FIREBASE_API_KEY: Required');
  });

  it('rejects an unrecognised seed flag', () => {
    expect(() => loadConfig({ ...validEnv, VITE_SEED_TODOS: 'yes' })).toThrow(/^Invalid configuration: VITE_SEED_TODOS: /);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ ...validEnv, MODE: 'test', DEV: true }).firebase.projectId).toBe('todo-test');
  });
});

describe('readLogLevel', () => {
  it('returns the configured level', () => {
    expect(readLogLevel({ VITE_LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('falls back to info when unset or invalid', () => {
    expect(readLogLevel({})).toBe('info');
    expect(readLogLevel({ VITE_LOG_LEVEL: 'verbose' })).toBe('info');
  });
});
