import { CompletionService } from '../../src/models/completion';
import { QAPair } from '../../src/models/interview-qa';
import {
  describeGenerationError,
  formatInterviewQa,
  InterviewQaService,
  renderInterviewQaPrompt,
} from '../../src/services/interview-qa.service';
import { interviewQaSystemPrompt } from '../../src/prompts/interview-qa.prompt';

jest.mock('@resume-screener/integration', () => ({
  defaultLogger: () => ({ debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }),
}));

function pairs(count: number): QAPair[] {
  return Array.from({ length: count }, (_, index) => ({
    question: `Question ${index + 1}?`,
    answer: `Answer ${index + 1}.`,
  }));
}

describe('InterviewQaService', () => {
  const complete = jest.fn<Promise<string>, Parameters<CompletionService['complete']>>();
  const service = new InterviewQaService({ complete });

  beforeEach(() => {
    complete.mockReset();
  });

  it('should return the generated pairs in order', async () => {
    complete.mockResolvedValue(JSON.stringify({ questions: pairs(10) }));

    const result = await service.generateQa('Data engineer', 'Jane Doe\nPython');

    expect(result).toEqual({ ok: true, value: pairs(10) });
    expect(complete).toHaveBeenCalledWith({
      system: interviewQaSystemPrompt,
      prompt: renderInterviewQaPrompt('Data engineer', 'Jane Doe\nPython'),
      temperature: 0.7,
      maxTokens: 1500,
      responseFormat: 'json_object',
    });
  });

  it('should drop questions beyond ten', async () => {
    complete.mockResolvedValue(JSON.stringify({ questions: pairs(12) }));

    await expect(service.generateQa('Data engineer', 'Jane Doe')).resolves.toEqual({ ok: true, value: pairs(10) });
  });

  it('should accept fewer questions', async () => {
    complete.mockResolvedValue(JSON.stringify({ questions: pairs(3) }));

    await expect(service.generateQa('Data engineer', 'Jane Doe')).resolves.toEqual({ ok: true, value: pairs(3) });
  });

  it('should treat a missing questions list as empty', async () => {
    complete.mockResolvedValue('{}');

    await expect(service.generateQa('Data engineer', 'Jane Doe')).resolves.toEqual({ ok: true, value: [] });
  });

  it('should report malformed questions', async () => {
    complete.mockResolvedValue(JSON.stringify({ questions: [{ question: 'Why Python?' }] }));

    await expect(service.generateQa('Data engineer', 'Jane Doe')).resolves.toEqual({
      ok: false,
      error: { kind: 'MalformedResponse', message: 'Malformed questions in the response: questions.0.answer Required' },
    });
  });

  it('should report service failures', async () => {
    complete.mockRejectedValue(new Error('Rate limit reached'));

    await expect(service.generateQa('Data engineer', 'Jane Doe')).resolves.toEqual({
      ok: false,
      error: { kind: 'ServiceFailure', message: 'Rate limit reached' },
    });
  });

  it('should report text that is not JSON as a service failure', async () => {
    complete.mockResolvedValue('1. Why Python?');

    const result = await service.generateQa('Data engineer', 'Jane Doe');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe('ServiceFailure');
  });

  it('should require both inputs', async () => {
    await expect(service.generateQa(' ', 'Jane Doe')).resolves.toEqual({
      ok: false,
      error: { kind: 'EmptyContent', message: 'Job description and resume content are required.' },
    });
    expect(complete).not.toHaveBeenCalled();
  });
});

describe('formatInterviewQa', () => {
  it('should number the questions from one', () => {
    const text = formatInterviewQa([
      { question: 'Why Go?', answer: 'Concurrency.' },
      { question: 'SQL?', answer: 'Yes.' },
    ]);

    expect(text).toBe('**1. Why Go?**\nSuggested Answer: Concurrency.\n\n**2. SQL?**\nSuggested Answer: Yes.\n');
  });

  it('should describe generation errors', () => {
    expect(describeGenerationError({ kind: 'ServiceFailure', message: 'Rate limit reached' })).toBe(
      'Error generating interview Q&A: Rate limit reached',
    );
  });
});
