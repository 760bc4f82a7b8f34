import type { UnresolvedLine } from './types/pipeline.js';

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export type PipelineErrorCode = 'KEY_RESOLUTION' | 'RECONCILIATION_MISMATCH' | 'WRITE_FAILURE';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message };
  }
}

export class KeyResolutionError extends PipelineError {
  readonly code = 'KEY_RESOLUTION';
  readonly line: UnresolvedLine;

  constructor(line: UnresolvedLine) {
    super(`line ${line.index}: ${line.reason}`);
    this.name = 'KeyResolutionError';
    this.line = line;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), line: this.line };
  }
}

export class ReconciliationMismatch extends PipelineError {
  readonly code = 'RECONCILIATION_MISMATCH';
  readonly sourceTotal: number;
  readonly factTotal: number;
  readonly delta: number;
  readonly epsilon: number;

  constructor(totals: { sourceTotal: number; factTotal: number; delta: number; epsilon: number }) {
    super(
      `source total ${totals.sourceTotal} and fact total ${totals.factTotal} differ by ${totals.delta} (epsilon ${totals.epsilon})`
    );
    this.name = 'ReconciliationMismatch';
    this.sourceTotal = totals.sourceTotal;
    this.factTotal = totals.factTotal;
    this.delta = totals.delta;
    this.epsilon = totals.epsilon;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      sourceTotal: this.sourceTotal,
      factTotal: this.factTotal,
      delta: this.delta,
      epsilon: this.epsilon,
    };
  }
}

export class WriteFailure extends PipelineError {
  readonly code = 'WRITE_FAILURE';
  readonly destination: string;

  constructor(destination: string, message: string, options?: { cause?: unknown }) {
    super(`write to ${destination} failed: ${message}`, options);
    this.name = 'WriteFailure';
    this.destination = destination;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), destination: this.destination };
  }
}
