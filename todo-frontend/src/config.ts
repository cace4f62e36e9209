/**
 * Application configuration, read from Vite's `import.meta.env`.
 * Only variables prefixed with VITE_ reach the client bundle.
 */
import { z } from 'zod';
import type { FirebaseOptions } from 'firebase/app';
import { ConfigError } from './errors';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  firebase: FirebaseOptions;
  seedTodos: boolean;
}

type Env = Record<string, unknown>;

const logLevelSchema = z.enum(LOG_LEVELS).default('info');

const envSchema = z.object({
  VITE_FIREBASE_API_KEY: z.string().min(1),
  VITE_FIREBASE_AUTH_DOMAIN: z.string().min(1),
  VITE_FIREBASE_PROJECT_ID: z.string().min(1),
  VITE_FIREBASE_APP_ID: z.string().min(1),
  VITE_FIREBASE_STORAGE_BUCKET: z.string().optional(),
  VITE_FIREBASE_MESSAGING_SENDER_ID: z.string().optional(),
  VITE_SEED_TODOS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true')
});

/**
 * Parses the environment into an `AppConfig`.
 *
 * @throws ConfigError listing every invalid variable as `KEY: message`
 */
export function loadConfig(env: Env = import.meta.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    firebase: {
      apiKey: vars.VITE_FIREBASE_API_KEY,
      authDomain: vars.VITE_FIREBASE_AUTH_DOMAIN,
      projectId: vars.VITE_FIREBASE_PROJECT_ID,
      storageBucket: vars.VITE_FIREBASE_STORAGE_BUCKET,
      messagingSenderId: vars.VITE_FIREBASE_MESSAGING_SENDER_ID,
      appId: vars.VITE_FIREBASE_APP_ID
    },
    seedTodos: vars.VITE_SEED_TODOS
  };
}

// Sole reader of VITE_LOG_LEVEL; unknown levels fall back to info
export function readLogLevel(env: Env = import.meta.env): LogLevel {
  const parsed = logLevelSchema.safeParse(env.VITE_LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}
