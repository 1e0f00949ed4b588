export type FailureKind = 'EmptyContent' | 'ServiceFailure' | 'MalformedResponse';

/**
 * Failure reported by the AI backed services. Never thrown, always returned inside a Result.
 */
export interface PipelineFailure {
  kind: FailureKind;
  message: string;
}

export type EvaluationError = PipelineFailure;
export type GenerationError = PipelineFailure;

/**
 * The document was declared with a media type we cannot extract text from.
 * Fails only the affected document, never the whole batch.
 */
export class UnsupportedFormatError extends Error {
  constructor(readonly mediaType: string) {
    super(`Unsupported file type (${mediaType || 'unknown'}). Provide PDF, DOCX, or TXT only.`);
    this.name = 'UnsupportedFormatError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
