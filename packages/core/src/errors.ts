/**
 * Error taxonomy.
 *
 * Completion failures keep their identity as they travel out of a turn:
 * the orchestrator only tags them with the stage that was running.
 * Anything else thrown inside a stage is wrapped in a StageError.
 */

export class MindError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type CompletionErrorKind = 'transport' | 'api' | 'invalid_model';

export abstract class CompletionError extends MindError {
  abstract readonly kind: CompletionErrorKind;
  /** Pipeline stage that issued the failing call, set by the orchestrator. */
  stage?: string;
}

/** Network failure, invalid URL, or timeout. */
export class TransportError extends CompletionError {
  readonly kind = 'transport';
}

/** Non-success status or malformed body. Carries the raw server body. */
export class ApiError extends CompletionError {
  readonly kind = 'api';

  constructor(
    readonly status: number,
    readonly body: string,
    message?: string,
  ) {
    super(message ?? `Completion API ${status}: ${body.slice(0, 200)}`);
  }
}

export class InvalidModelError extends CompletionError {
  readonly kind = 'invalid_model';

  constructor(readonly model: string) {
    super(`Model not available: ${model}`);
  }
}

export class StageError extends MindError {
  constructor(
    readonly stage: string,
    cause: unknown,
  ) {
    const msg = cause instanceof Error ? cause.message : String(cause);
    super(`Stage ${stage} failed: ${msg}`, { cause });
  }
}

export class TurnAbortedError extends MindError {
  constructor(readonly stage?: string) {
    super(stage ? `Turn aborted during ${stage}` : 'Turn aborted');
  }
}

export class ConfigError extends MindError {}

export class ConversationNotFoundError extends MindError {
  constructor(readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`);
  }
}

export function isCompletionError(err: unknown): err is CompletionError {
  return err instanceof CompletionError;
}
