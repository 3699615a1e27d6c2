/**
 * Engine Fault Classes
 *
 * Fault taxonomy for the tick pipeline. @vixbot/core has zero dependencies
 * on other @vixbot packages, so these extend Error directly.
 *
 * - InsufficientData: not enough history yet; treated as "no signal this tick"
 * - InvalidState: an operation is not valid right now; that operation aborts
 * - DataQuality: the price sample is unusable; the whole tick is skipped
 */

export type FaultKind = 'InsufficientData' | 'InvalidState' | 'DataQuality';

export abstract class EngineFault extends Error {
  abstract readonly kind: FaultKind;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}

export class InsufficientDataError extends EngineFault {
  readonly kind = 'InsufficientData' as const;

  constructor(required: number, available: number, context?: Record<string, unknown>) {
    super(`Insufficient data: need ${required}, have ${available}`, {
      required,
      available,
      ...context,
    });
  }
}

export class InvalidStateError extends EngineFault {
  readonly kind = 'InvalidState' as const;
}

export class DataQualityError extends EngineFault {
  readonly kind = 'DataQuality' as const;
}

export function isEngineFault(error: unknown): error is EngineFault {
  return error instanceof EngineFault;
}

/**
 * Classify anything thrown inside a tick. Unknown errors are reported
 * as InvalidState: the step that threw is aborted, the engine keeps running.
 */
export function classifyFault(error: unknown, step: string): EngineFault {
  if (isEngineFault(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InvalidStateError(`Unexpected failure in ${step}: ${message}`, {
    step,
    cause: error instanceof Error ? error.name : typeof error,
  });
}
