/**
 * Error types shared across the sync pipeline.
 *
 * A failed remote listing has no class here: the prober reports it as
 * `degraded` and the run carries on against an empty remote set.
 */

export class NotFoundError extends Error {
  constructor(public readonly path: string, what = 'Directory') {
    super(`${what} not found: ${path}`);
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class TransientCommitFailure extends Error {
  constructor(
    public readonly batchIndex: number,
    public readonly attempt: number,
    public cause?: unknown
  ) {
    super(`Batch ${batchIndex} attempt ${attempt} failed: ${describeError(cause)}`);
    this.name = 'TransientCommitFailure';
  }
}

export class TerminalCommitFailure extends Error {
  constructor(
    public readonly batchIndex: number,
    public readonly attempts: number,
    public cause?: unknown
  ) {
    super(`Batch ${batchIndex} failed after ${attempts} attempt(s): ${describeError(cause)}`);
    this.name = 'TerminalCommitFailure';
  }
}

export interface TransportAttempt {
  transport: string;
  url: string;
  error: string;
}

export class MirrorTransportFailure extends Error {
  constructor(public readonly attempts: TransportAttempt[]) {
    super(
      attempts.length === 0
        ? 'No clone transports configured'
        : `Could not clone via ${attempts.map(a => a.transport).join(', ')}: ${attempts[attempts.length - 1].error}`
    );
    this.name = 'MirrorTransportFailure';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
