export class PipelineError extends Error {
  constructor(
    readonly code: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends PipelineError {
  constructor(readonly inputPath: string) {
    super('InputNotFound', `Input path not found: ${inputPath}`);
  }
}

export class PrerequisiteMissingError extends PipelineError {
  constructor(readonly missing: { tool: string; detail: string }[]) {
    super(
      'PrerequisiteMissing',
      `Required tools are unavailable: ${missing.map((m) => `${m.tool} (${m.detail})`).join(', ')}`,
    );
  }
}

export class EngineFailureError extends PipelineError {
  constructor(message: string) {
    super('EngineFailure', message);
  }
}

/**
 * The engine reported a recovered hash line that matches nothing in the corpus.
 * The corpus and the engine disagree, so the cracked set cannot be trusted.
 */
export class EngineCorrelationError extends PipelineError {
  constructor(readonly unmatched: string[]) {
    super(
      'EngineCorrelationFailure',
      `${unmatched.length} recovered hash line(s) match no corpus entry`,
    );
  }
}

export class PersistenceWriteError extends PipelineError {
  constructor(target: string, cause: unknown) {
    super('PersistenceWriteFailure', `Failed to write ${target}`, cause);
  }
}

export class RepositoryError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('RepositoryError', message, cause);
  }
}

export class SessionNotFoundError extends PipelineError {
  constructor(sessionId: string) {
    super('SessionNotFound', `Session ${sessionId} not found`);
  }
}

export class SessionImmutableError extends PipelineError {
  constructor(sessionId: string, phase: string) {
    super('SessionImmutable', `Session ${sessionId} is ${phase} and can no longer change`);
  }
}

export class PhaseTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super('PhaseTransition', `Cannot move session phase from ${from} to ${to}`);
  }
}

export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof PipelineError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: err.name || 'Error', message: err.message };
  return { code: 'Error', message: String(err) };
}
