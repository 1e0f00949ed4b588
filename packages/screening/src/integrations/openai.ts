import { defaultLogger, SecretsManager } from '@resume-screener/integration';
import OpenAI from 'openai';
import { ChatCompletionCreateParamsNonStreaming, CompletionUsage } from 'openai/resources';
import { z } from 'zod';
import { Config, ProjectName } from '../config';
import { CompletionRequest, CompletionService } from '../models/completion';

const log = defaultLogger({ serviceName: 'openai-integration' });

/**
 * The secret holds a common key and optional project-specific keys.
 */
const OpenAiSecretSchema = z.object({ common: z.string() }).catchall(z.string());

export interface OpenAiCompletionOptions {
  model: string;
  apiKey: string | null;
  secretName: string | null;
  timeoutMs: number;
  maxRetries: number;
}

export class OpenAiCompletionService implements CompletionService {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiCompletionOptions) {}

  static fromConfig(): OpenAiCompletionService {
    return new OpenAiCompletionService({
      model: Config.getOpenAiModel(),
      apiKey: Config.getOpenAiApiKey(),
      secretName: Config.getOpenAiSecretName(),
      timeoutMs: Config.getRequestTimeoutMs(),
      maxRetries: Config.getMaxRetries(),
    });
  }

  async getApiClient(): Promise<OpenAI> {
    if (this.client != null) {
      return this.client;
    }

    this.client = new OpenAI({
      apiKey: this.options.apiKey ?? (await this.fetchApiKey()),
      timeout: this.options.timeoutMs,
      maxRetries: this.options.maxRetries,
    });

    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.options.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      response_format: request.responseFormat === 'json_object' ? { type: 'json_object' } : { type: 'text' },
      n: 1,
    };
    log.debug('Sending completion request', {
      model: params.model,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    });

    const client = await this.getApiClient();
    const result = await client.chat.completions.create(params);
    const choice = result.choices[0];
    if (choice?.finish_reason === 'length') {
      throw new CompletionTokenLimitError(result.usage);
    }

    const content = choice?.message.content;
    if (content == null || content.trim().length === 0) {
      throw new Error('Completion response did not include content');
    }

    log.debug(`Completion received (${result.usage?.total_tokens ?? 'unknown'} tokens)`);
    return content;
  }

  private async fetchApiKey(): Promise<string> {
    if (this.options.secretName == null) {
      throw new Error('OPENAI_API_KEY or OPENAI_SECRET_NAME env variable should be defined');
    }

    const secret = OpenAiSecretSchema.safeParse(await SecretsManager.fetchSecretJson(this.options.secretName));
    if (!secret.success) {
      throw new Error(`OpenAI configuration is not available in secret ${this.options.secretName}`);
    }

    const projectKey = secret.data[ProjectName];
    if (projectKey == null) {
      log.warn(`Unable to find OpenAI API key for project ${ProjectName}, using the common key`);
      return secret.data.common;
    }
    return projectKey;
  }
}

export class CompletionTokenLimitError extends Error {
  constructor(usage?: CompletionUsage) {
    super(
      `Request exceeds token limitation (Prompt: ${usage?.prompt_tokens}, Completion: ${usage?.completion_tokens}, Total: ${usage?.total_tokens})`,
    );
    this.name = 'CompletionTokenLimitError';
  }
}
