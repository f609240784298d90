export type ErrorKind =
  | 'input-not-found'
  | 'validation'
  | 'encoder-unavailable'
  | 'encoder-process'
  | 'writer-init'
  | 'unexpected';

export interface BaseErrorOptions {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage: boolean;
}

/**
 * Root of every error the project raises on purpose. `exposeMessage` marks
 * messages written for the operator; the others stay in the logs.
 */
export class StillmotionError extends Error {
  public readonly code: string;

  public readonly kind: ErrorKind;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  protected constructor(options: BaseErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.kind = options.kind;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      metadata: this.metadata,
    };
  }
}
