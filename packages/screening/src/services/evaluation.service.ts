import { defaultLogger } from '@resume-screener/integration';
import Handlebars from 'handlebars';
import { z } from 'zod';
import { errorMessage, EvaluationError } from '../common/errors';
import { isBlank, parseJsonResponse } from '../common/json';
import { err, ok, Result } from '../common/result';
import { CompletionService } from '../models/completion';
import {
  DefaultRationale,
  EvaluationRecord,
  isMatch,
  MatchThreshold,
  sentinelRecord,
  UnknownCandidateName,
} from '../models/evaluation';
import { evaluationSystemPrompt, evaluationUserPrompt } from '../prompts/evaluation.prompt';

const log = defaultLogger({ serviceName: 'evaluation-service' });

export const EvaluationMaxTokens = 1000;
export const EvaluationTemperature = 0;

const evaluationPromptTemplate = Handlebars.compile(evaluationUserPrompt, { noEscape: true });

const NonEmptyString = z.string().trim().min(1);

/**
 * Every field falls back to its default on its own, so one bad field does not discard the others.
 */
export const EvaluationResponseSchema = z.object({
  'Candidate Name': NonEmptyString.catch(UnknownCandidateName),
  Email: NonEmptyString.refine((value) => value.toUpperCase() !== 'N/A')
    .nullable()
    .catch(null),
  Score: z
    .union([z.number(), NonEmptyString])
    .pipe(z.coerce.number().finite())
    .transform((value) => Math.min(100, Math.max(0, Math.trunc(value))))
    .catch(0),
  Match: z.union([z.string(), z.boolean()]).optional().catch(undefined),
  'Skills Found': z
    .array(z.unknown())
    .transform((items) =>
      items
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    )
    .catch([]),
  Rationale: NonEmptyString.catch(DefaultRationale),
});

export function renderEvaluationPrompt(jobDescription: string, resumeText: string): string {
  return evaluationPromptTemplate({ jobDescription, resumeText, matchThreshold: MatchThreshold });
}

/**
 * Map the raw evaluation (or its failure) into a record. Never throws.
 * The match flag is derived from the score, the label the model declared is only compared against it.
 */
export function parseEvaluation(result: Result<unknown, EvaluationError>): EvaluationRecord {
  if (!result.ok) {
    return sentinelRecord(result.error.message);
  }

  const parsed = EvaluationResponseSchema.safeParse(result.value);
  if (!parsed.success) {
    return sentinelRecord('Error during parsing: the evaluation response is not a JSON object');
  }

  const data = parsed.data;
  const match = isMatch(data.Score);
  const declaredMatch = declaredMatchLabel(data.Match);
  if (declaredMatch != null && declaredMatch !== match) {
    log.warn(
      `Declared match (${String(data.Match)}) disagrees with score ${data.Score} for ${data['Candidate Name']}, using the score`,
    );
  }

  return {
    candidateName: data['Candidate Name'],
    email: data.Email,
    score: data.Score,
    match,
    skills: data['Skills Found'],
    rationale: data.Rationale,
  };
}

function declaredMatchLabel(label: string | boolean | undefined): boolean | null {
  if (typeof label === 'boolean') {
    return label;
  }
  switch (label?.trim().toLowerCase()) {
    case 'yes':
      return true;
    case 'no':
      return false;
    default:
      return null;
  }
}

export class EvaluationService {
  constructor(private readonly completion: CompletionService) {}

  async evaluate(jobDescription: string, resumeText: string): Promise<EvaluationRecord> {
    return parseEvaluation(await this.requestEvaluation(jobDescription, resumeText));
  }

  /**
   * Ask the model to score the resume. Empty inputs short-circuit without calling the service,
   * service errors and non-JSON responses are returned as failures.
   */
  async requestEvaluation(jobDescription: string, resumeText: string): Promise<Result<unknown, EvaluationError>> {
    if (isBlank(resumeText)) {
      return err({ kind: 'EmptyContent', message: 'The resume content is empty.' });
    }
    if (isBlank(jobDescription)) {
      return err({ kind: 'EmptyContent', message: 'The job description is empty.' });
    }

    try {
      const text = await this.completion.complete({
        system: evaluationSystemPrompt,
        prompt: renderEvaluationPrompt(jobDescription, resumeText),
        temperature: EvaluationTemperature,
        maxTokens: EvaluationMaxTokens,
        responseFormat: 'json_object',
      });
      return ok(parseJsonResponse(text));
    } catch (error) {
      log.error(`AI evaluation failed: ${errorMessage(error)}`);
      return err({ kind: 'ServiceFailure', message: `AI evaluation failed: ${errorMessage(error)}` });
    }
  }
}
