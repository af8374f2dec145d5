export class KnowledgeBaseError extends Error {
  constructor(
    message: string,
    public readonly sourceId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source bytes are not valid UTF-8 text. */
export class DecodeError extends KnowledgeBaseError {}

export class SourceTooLargeError extends KnowledgeBaseError {}

/** The summarizer failed or returned nothing usable; retried next pass. */
export class SummarizerError extends KnowledgeBaseError {}

export class TimeoutError extends KnowledgeBaseError {}

export class LockError extends KnowledgeBaseError {}

export class PersistError extends KnowledgeBaseError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
