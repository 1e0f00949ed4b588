import { getStableEnvironmentName } from '@resume-screener/integration';

export const ProjectName = 'resume-screener';
export const DefaultModel = 'gpt-4o-mini-2024-07-18';
export const DefaultRequestTimeoutMs = 60000;
export const DefaultMaxRetries = 2;

export class Config {
  static getOpenAiApiKey(): string | null {
    return readEnvVariable('OPENAI_API_KEY') ?? readEnvVariable('API_KEY');
  }

  static getOpenAiSecretName(): string | null {
    return readEnvVariable('OPENAI_SECRET_NAME');
  }

  static getOpenAiModel(): string {
    return readEnvVariable('OPENAI_MODEL') ?? DefaultModel;
  }

  static getRequestTimeoutMs(): number {
    return readIntegerEnvVariable('OPENAI_TIMEOUT_MS', DefaultRequestTimeoutMs, 1);
  }

  static getMaxRetries(): number {
    return readIntegerEnvVariable('OPENAI_MAX_RETRIES', DefaultMaxRetries, 0);
  }

  static getDataTableName(): string {
    return readEnvVariable('DDB_DATA_TABLE_NAME') ?? `${ProjectName}-${getStableEnvironmentName()}-data`;
  }
}

function readEnvVariable(name: string): string | null {
  const value = process.env[name]?.trim();
  return value != null && value.length > 0 ? value : null;
}

function readIntegerEnvVariable(name: string, defaultValue: number, min: number): number {
  const raw = readEnvVariable(name);
  if (raw == null) {
    return defaultValue;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= min ? value : defaultValue;
}
