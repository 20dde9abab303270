/**
 * Error taxonomy for a pipeline run. Nothing here is retried: every class is
 * either fatal for the run or handled by the caller as "no track of this kind".
 */

export class PipelineError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Invalid configuration values. Raised before any processing starts. */
export class ValidationError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Missing, zero-byte or corrupt source material. */
export class IntegrityError extends PipelineError {
  constructor(message: string, public readonly paths: string[] = []) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/** Nothing with a positive duration to fit against the target. */
export class InsufficientMaterialError extends IntegrityError {
  constructor(message = 'Insufficient material to cover the target duration') {
    super(message);
    this.name = 'InsufficientMaterialError';
  }
}

export class ProbeError extends PipelineError {
  constructor(public readonly path: string, detail: string, cause?: unknown) {
    super(`Could not probe duration of ${path}: ${detail}`, cause);
    this.name = 'ProbeError';
  }
}

/** The transcoding engine exited non-zero or produced no output. */
export class EngineError extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly exitCode: number | null,
    public readonly diagnosticTail: string,
  ) {
    super(
      `Engine ${operation} failed (exit ${exitCode ?? 'unknown'})` +
        (diagnosticTail ? `:\n${diagnosticTail}` : ''),
    );
    this.name = 'EngineError';
  }
}

/** A concat batch is missing an input or did not produce its output. */
export class BatchError extends PipelineError {
  constructor(message: string, public readonly files: string[]) {
    super(files.length > 0 ? `${message}\n  ${files.join('\n  ')}` : message);
    this.name = 'BatchError';
  }
}

/** Not enough disk space for the estimated output. */
export class ResourceError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceError';
  }
}
