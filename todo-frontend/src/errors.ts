/**
 * Error classes for the application
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  code: string;

  constructor(message: string, code: string = 'APP_ERROR', options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing or malformed configuration
 */
export class ConfigError extends AppError {
  constructor(message: string, code: string = 'CONFIG_ERROR') {
    super(message, code);
  }
}

export type BootstrapErrorCode = 'BACKEND_MISCONFIGURED' | 'BACKEND_UNREACHABLE';

/**
 * Startup failed; fatal to the current launch
 */
export class BootstrapError extends AppError {
  declare code: BootstrapErrorCode;

  constructor(message: string, code: BootstrapErrorCode, cause?: unknown) {
    super(message, code, { cause });
  }
}

export const toBootstrapError = (error: unknown): BootstrapError => {
  if (error instanceof BootstrapError) {
    return error;
  }
  if (error instanceof ConfigError) {
    return new BootstrapError(error.message, 'BACKEND_MISCONFIGURED', error);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new BootstrapError(`Remote backend initialization failed: ${reason}`, 'BACKEND_UNREACHABLE', error);
};
