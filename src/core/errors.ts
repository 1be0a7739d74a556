import type { Domain } from './types.js';

export type ErrorCode =
  | 'EMPTY_GENERATION'
  | 'GENERATION_FAILED'
  | 'NO_PENDING_OPTIONS'
  | 'INDEX_OUT_OF_RANGE'
  | 'PERSISTENCE_FAILED'
  | 'CONVERSATION_NOT_FOUND';

export abstract class ScriptError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** Provider answered but produced no usable candidate. */
export class EmptyGenerationError extends ScriptError {
  readonly code = 'EMPTY_GENERATION';

  constructor(public readonly domain: Domain) {
    super(`No ${domain} options came back from the generator`);
  }
}

export type GenerationFailure = 'provider' | 'network' | 'timeout' | 'unavailable';

/** Provider, network or timeout failure. Never retried inside the core. */
export class GenerationError extends ScriptError {
  readonly code = 'GENERATION_FAILED';

  constructor(
    public readonly domain: Domain,
    public readonly reason: GenerationFailure,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class NoPendingOptionsError extends ScriptError {
  readonly code = 'NO_PENDING_OPTIONS';

  constructor() {
    super('There are no options waiting for a choice');
  }
}

export class IndexOutOfRangeError extends ScriptError {
  readonly code = 'INDEX_OUT_OF_RANGE';

  constructor(public readonly index: number, public readonly size: number) {
    super(`Option ${index} does not exist; choose between 1 and ${size}`);
  }
}

export class PersistenceError extends ScriptError {
  readonly code = 'PERSISTENCE_FAILED';

  constructor(public readonly operation: string, cause?: unknown) {
    super(`Could not ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
  }
}

export class ConversationNotFoundError extends ScriptError {
  readonly code = 'CONVERSATION_NOT_FOUND';

  constructor(public readonly conversationId: string) {
    super(`Conversation ${conversationId} does not exist`);
  }
}

/** Errors the user fixes by changing their input rather than resubmitting it. */
export function isRecoverable(err: unknown): boolean {
  return err instanceof EmptyGenerationError
    || err instanceof NoPendingOptionsError
    || err instanceof IndexOutOfRangeError;
}

/** Stable message for errors that escape to the transport. */
export function describeError(err: unknown): string {
  if (err instanceof GenerationError) {
    const what = err.reason === 'timeout'
      ? `Generating ${err.domain} options timed out`
      : err.reason === 'unavailable'
        ? `No generation provider is available for ${err.domain}`
        : `Generating ${err.domain} options failed (${err.reason})`;
    return `${what}. Send the same message again to retry.`;
  }
  if (err instanceof ConversationNotFoundError) {
    return `Conversation ${err.conversationId} was not found. Leave out the conversation id to start a new one.`;
  }
  if (err instanceof PersistenceError) {
    return 'Your conversation could not be saved, so nothing was changed. Send the same message again to retry.';
  }
  return 'Something went wrong and nothing was changed. Send the same message again to retry.';
}
