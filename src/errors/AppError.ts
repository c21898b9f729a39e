export type AppErrorCode =
  | 'CONFIG_INVALID'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'ALREADY_RUNNING'
  | 'INTERNAL_ERROR';

/**
 * AppError - Unified application error class
 *
 * Raised by the bridge's own infrastructure (config loading, entity and
 * feature registries). Host callbacks never see one: the orchestrator logs
 * and absorbs anything thrown beneath it.
 *
 * @example
 * throw AppError.notFound('Unknown entity kind: GameMode');
 * throw AppError.configInvalid('Invalid config file', { path });
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: AppErrorCode = 'INTERNAL_ERROR',
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * A configuration file, section or environment variable failed validation
   */
  static configInvalid(message: string, details?: unknown): AppError {
    return new AppError(message, 'CONFIG_INVALID', details);
  }

  /**
   * A named entity, kind or feature is not registered
   */
  static notFound(message: string = 'Not found'): AppError {
    return new AppError(message, 'NOT_FOUND');
  }

  /**
   * Registering something under a name that is already taken
   */
  static conflict(message: string, details?: unknown): AppError {
    return new AppError(message, 'CONFLICT', details);
  }

  /**
   * Another orchestrator already owns the session slot
   */
  static alreadyRunning(message: string = 'Session already running'): AppError {
    return new AppError(message, 'ALREADY_RUNNING');
  }

  static internal(message: string = 'Internal error'): AppError {
    return new AppError(message, 'INTERNAL_ERROR');
  }

  /**
   * Check if an error is an AppError
   */
  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
