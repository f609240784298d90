import type {
  EncoderPath,
  ProgressListener,
  TimelapseEncoder,
  TimelapseJob,
} from '../../../domain/timelapse/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

export type OrchestratorState =
  | 'idle'
  | 'encoding-primary'
  | 'encoding-fallback'
  | 'done'
  | 'failed';

export type EncodeOutcome =
  | {
      readonly status: 'done';
      readonly encoder: EncoderPath;
      readonly outputPath: string;
      readonly primaryFailure?: AppError;
    }
  | {
      readonly status: 'failed';
      readonly primaryFailure: AppError;
      readonly fallbackFailure: AppError;
    };

export interface StateTransition {
  readonly from: OrchestratorState;
  readonly to: OrchestratorState;
  readonly jobId: string;
  readonly error?: AppError;
}

export interface EncodeListeners {
  readonly onProgress?: ProgressListener;
  readonly onTransition?: (transition: StateTransition) => void;
}

type AttemptResult =
  | { readonly ok: true; readonly outputPath: string }
  | { readonly ok: false; readonly error: AppError };

/**
 * Runs the primary encoder and, on any failure, exactly one fallback
 * attempt. Failures come back as values, never as thrown errors.
 */
export class EncodeOrchestrator {
  private readonly logger = createChildLogger({ module: 'EncodeOrchestrator' });

  private currentState: OrchestratorState = 'idle';

  public constructor(
    private readonly primary: TimelapseEncoder,
    private readonly fallback: TimelapseEncoder,
  ) {}

  public get state(): OrchestratorState {
    return this.currentState;
  }

  public async run(job: TimelapseJob, listeners: EncodeListeners = {}): Promise<EncodeOutcome> {
    if (this.currentState === 'encoding-primary' || this.currentState === 'encoding-fallback') {
      throw new Error('An encode is already running on this orchestrator');
    }

    const { onProgress } = listeners;
    const transition = (to: OrchestratorState, error?: AppError): void => {
      const from = this.currentState;
      this.currentState = to;
      this.logger.debug({ jobId: job.id, from, to }, 'Encode state changed');
      listeners.onTransition?.({ from, to, jobId: job.id, error });
    };

    this.currentState = 'idle';
    transition('encoding-primary');

    const primary = await this.attempt(this.primary, job, onProgress);
    if (primary.ok) {
      transition('done');
      return { status: 'done', encoder: this.primary.path, outputPath: primary.outputPath };
    }

    this.logger.warn(
      { jobId: job.id, code: primary.error.code, error: primary.error.message },
      'Primary encoder failed, falling back to in-process writer',
    );
    transition('encoding-fallback', primary.error);

    const fallback = await this.attempt(this.fallback, job, onProgress);
    if (fallback.ok) {
      transition('done');
      return {
        status: 'done',
        encoder: this.fallback.path,
        outputPath: fallback.outputPath,
        primaryFailure: primary.error,
      };
    }

    this.logger.error(
      { jobId: job.id, code: fallback.error.code, error: fallback.error.message },
      'Fallback encoder failed',
    );
    transition('failed', fallback.error);

    return { status: 'failed', primaryFailure: primary.error, fallbackFailure: fallback.error };
  }

  private async attempt(
    encoder: TimelapseEncoder,
    job: TimelapseJob,
    onProgress?: ProgressListener,
  ): Promise<AttemptResult> {
    try {
      const outputPath = await encoder.encode(job, onProgress);
      return { ok: true, outputPath };
    } catch (error) {
      return { ok: false, error: AppError.fromUnknown(error, `encoder.${encoder.path}.failure`) };
    }
  }
}
