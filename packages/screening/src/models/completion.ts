export type CompletionResponseFormat = 'json_object' | 'text';

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  responseFormat: CompletionResponseFormat;
}

/**
 * Text-completion boundary of the AI service. Implementations throw on transport errors and timeouts.
 */
export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}
