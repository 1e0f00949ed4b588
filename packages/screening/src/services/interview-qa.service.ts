import { defaultLogger } from '@resume-screener/integration';
import Handlebars from 'handlebars';
import { z } from 'zod';
import { errorMessage, GenerationError } from '../common/errors';
import { isBlank, parseJsonResponse } from '../common/json';
import { err, ok, Result } from '../common/result';
import { CompletionService } from '../models/completion';
import { InterviewQuestionsCount, QAPair } from '../models/interview-qa';
import { interviewQaSystemPrompt, interviewQaUserPrompt } from '../prompts/interview-qa.prompt';

const log = defaultLogger({ serviceName: 'interview-qa-service' });

export const InterviewQaMaxTokens = 1500;
// Higher temperature gives more varied phrasing between regenerations
export const InterviewQaTemperature = 0.7;

const interviewQaPromptTemplate = Handlebars.compile(interviewQaUserPrompt, { noEscape: true });

export const InterviewQaResponseSchema = z.object({
  questions: z
    .array(
      z.object({
        question: z.string(),
        answer: z.string(),
      }),
    )
    .default([]),
});

export function renderInterviewQaPrompt(jobDescription: string, resumeText: string): string {
  return interviewQaPromptTemplate({ jobDescription, resumeText, questionsCount: InterviewQuestionsCount });
}

/**
 * Render the pairs for display, numbered from 1.
 */
export function formatInterviewQa(pairs: readonly QAPair[]): string {
  return pairs
    .flatMap((pair, index) => [`**${index + 1}. ${pair.question}**`, `Suggested Answer: ${pair.answer}\n`])
    .join('\n');
}

export function describeGenerationError(error: GenerationError): string {
  return `Error generating interview Q&A: ${error.message}`;
}

export class InterviewQaService {
  constructor(private readonly completion: CompletionService) {}

  /**
   * Generate interview questions with model answers for one candidate.
   * A response with fewer questions than requested is accepted as-is, extra questions are dropped.
   */
  async generateQa(jobDescription: string, resumeText: string): Promise<Result<QAPair[], GenerationError>> {
    if (isBlank(jobDescription) || isBlank(resumeText)) {
      return err({ kind: 'EmptyContent', message: 'Job description and resume content are required.' });
    }

    let raw: unknown;
    try {
      const text = await this.completion.complete({
        system: interviewQaSystemPrompt,
        prompt: renderInterviewQaPrompt(jobDescription, resumeText),
        temperature: InterviewQaTemperature,
        maxTokens: InterviewQaMaxTokens,
        responseFormat: 'json_object',
      });
      raw = parseJsonResponse(text);
    } catch (error) {
      log.error(`Interview Q&A generation failed: ${errorMessage(error)}`);
      return err({ kind: 'ServiceFailure', message: errorMessage(error) });
    }

    const parsed = InterviewQaResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const message = `Malformed questions in the response: ${issue.path.join('.') || 'root'} ${issue.message}`;
      log.warn(message);
      return err({ kind: 'MalformedResponse', message });
    }

    const questions = parsed.data.questions.slice(0, InterviewQuestionsCount);
    if (questions.length < InterviewQuestionsCount) {
      log.info(`Model returned ${questions.length} of ${InterviewQuestionsCount} requested questions`);
    }
    return ok(questions);
  }
}
