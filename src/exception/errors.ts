/** Browser unavailable or crashed, configuration missing. Aborts the run. */
export class InfrastructureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'InfrastructureError';
  }
}

/** Every strategy for one UI action was exhausted on a required field. */
export class InteractionFailure extends Error {
  constructor(
    message: string,
    public action: 'fill' | 'click' | 'radio' | 'dropdown',
    public target: string,
  ) {
    super(message);
    this.name = 'InteractionFailure';
  }
}

export class CaptureFailure extends Error {
  constructor(message: string, public purpose: string) {
    super(message);
    this.name = 'CaptureFailure';
  }
}

export class PersistenceFailure extends Error {
  constructor(message: string, public target: string) {
    super(message);
    this.name = 'PersistenceFailure';
  }
}
