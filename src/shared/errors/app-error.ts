import { StillmotionError, type ErrorKind } from './base.error.js';

interface AppErrorOptions {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends StillmotionError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      kind: options.kind,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, kind: 'unexpected', message: cause.message, cause, exposeMessage: false });
  }

  public static fromError(error: Error, code = 'UNEXPECTED_ERROR'): AppError {
    return new AppError({
      code,
      kind: 'unexpected',
      message: error.message,
      cause: error,
      exposeMessage: false,
    });
  }

  public static validation(
    code: string,
    message: string,
    metadata: Record<string, unknown> = {},
  ): AppError {
    return new AppError({
      code,
      kind: 'validation',
      message,
      metadata,
      exposeMessage: true,
    });
  }

  public static inputNotFound(code: string, path: string, role: string): AppError {
    return new AppError({
      code,
      kind: 'input-not-found',
      message: `The ${role} folder does not exist: ${path}`,
      metadata: { path, role },
      exposeMessage: true,
    });
  }

  public static encoderUnavailable(binaryPath: string, cause?: unknown): AppError {
    return new AppError({
      code: 'encoder.unavailable',
      kind: 'encoder-unavailable',
      message: `ffmpeg binary not found at ${binaryPath}. Place it under bin/ffmpeg or set FFMPEG_PATH.`,
      metadata: { binaryPath },
      cause,
      exposeMessage: true,
    });
  }

  public static encoderProcess(
    message: string,
    metadata: { exitCode: number | null; signal: string | null; diagnostics: string },
    cause?: unknown,
  ): AppError {
    return new AppError({
      code: 'encoder.process-failed',
      kind: 'encoder-process',
      message,
      metadata,
      cause,
      exposeMessage: true,
    });
  }

  public static writerInit(
    message: string,
    metadata?: Record<string, unknown>,
    cause?: unknown,
  ): AppError {
    return new AppError({
      code: 'writer.init-failed',
      kind: 'writer-init',
      message,
      metadata,
      cause,
      exposeMessage: true,
    });
  }
}
