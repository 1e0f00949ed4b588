#!/usr/bin/env node
import { defaultLogger } from '@resume-screener/integration';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { errorMessage } from './common/errors';
import { TextExtractor } from './extraction/text-extractor';
import { mediaTypeForFileName } from './extraction/mime-type';
import { OpenAiCompletionService } from './integrations/openai';
import { CompletionService } from './models/completion';
import { ResumeDocument } from './models/resume-document';
import { UsageLog, UsageLogDocument } from './models/usage-log';
import { User, UserDocument } from './models/user';
import { EvaluationService } from './services/evaluation.service';
import { describeGenerationError, formatInterviewQa, InterviewQaService } from './services/interview-qa.service';
import { exportEvaluationsCsv, toEvaluationTable } from './services/ranking';
import { ScreeningSession } from './services/screening-session';
import { DynamoDbUsageAnalytics, UsageAnalytics } from './services/usage-analytics.service';
import { buildUsageReport, exportUsageReportCsv } from './services/usage-report';

const log = defaultLogger({ serviceName: 'cli' });

const Usage = `Usage:
  resume-screener evaluate --job <file> --user <email> [--out <csv>] [--select <name>] [--qa] [--contact-fallback] <resume files...>
  resume-screener analytics --out <csv>`;

export interface CliServices {
  completion: CompletionService;
  analytics: UsageAnalytics;
  loadUsers(): Promise<UserDocument[]>;
  loadUsageLogs(): Promise<UsageLogDocument[]>;
}

export function defaultCliServices(): CliServices {
  return {
    completion: OpenAiCompletionService.fromConfig(),
    analytics: new DynamoDbUsageAnalytics(),
    loadUsers: () => User.getAll(),
    loadUsageLogs: () => UsageLog.getAll(),
  };
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * @returns the process exit code
 */
export async function main(argv: string[], services: CliServices = defaultCliServices()): Promise<number> {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case 'evaluate':
        return await evaluateCommand(rest, services);
      case 'analytics':
        return await analyticsCommand(rest, services);
      default:
        throw new UsageError(command == null ? 'Missing command' : `Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError || (error instanceof TypeError && 'code' in error)) {
      console.error(`${error.message}\n${Usage}`);
    } else {
      log.error('Command failed', error instanceof Error ? error : errorMessage(error));
    }
    return 1;
  }
}

async function evaluateCommand(args: string[], services: CliServices): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      job: { type: 'string' },
      user: { type: 'string' },
      out: { type: 'string' },
      select: { type: 'string' },
      qa: { type: 'boolean', default: false },
      'contact-fallback': { type: 'boolean', default: false },
    },
  });
  if (values.job == null || values.user == null) {
    throw new UsageError('Both --job and --user are required');
  }
  if (positionals.length === 0) {
    throw new UsageError('At least one resume file is required');
  }

  const jobDescription = await readFile(values.job, 'utf-8');
  const documents: ResumeDocument[] = await Promise.all(
    positionals.map(async (file) => ({
      name: path.basename(file),
      mediaType: mediaTypeForFileName(file),
      content: await readFile(file),
    })),
  );

  const session = new ScreeningSession(
    {
      extractor: new TextExtractor(),
      evaluator: new EvaluationService(services.completion),
      qaService: new InterviewQaService(services.completion),
      analytics: services.analytics,
    },
    values.user,
    { contactFallback: values['contact-fallback'] },
  );

  const batch = await session.evaluateBatch(jobDescription, documents);
  batch.errors.forEach((error) => console.error(error.message));
  if (batch.records.length === 0) {
    console.error('No resume could be evaluated');
    return 1;
  }

  const table = toEvaluationTable(batch.records);
  console.table(table.rows, [...table.columns]);

  if (values.out != null) {
    await writeFile(values.out, exportEvaluationsCsv(batch.records));
    console.log(`Results written to ${values.out}`);
  }

  if (values.select != null && !session.selectCandidate(values.select)) {
    console.error(`Candidate ${values.select} is not part of this batch, using ${session.selectedCandidate}`);
  }

  if (values.qa) {
    const result = await session.generateInterviewQa();
    if (!result.ok) {
      console.error(describeGenerationError(result.error));
      return 1;
    }
    console.log(`Interview Q&A for ${session.selectedCandidate}:\n`);
    console.log(formatInterviewQa(result.value));
  }

  return 0;
}

async function analyticsCommand(args: string[], services: CliServices): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      out: { type: 'string' },
    },
  });
  if (values.out == null) {
    throw new UsageError('--out is required');
  }

  const [users, logs] = await Promise.all([services.loadUsers(), services.loadUsageLogs()]);
  const report = buildUsageReport(users, logs);

  console.log(`Total resumes processed: ${report.overview.totalResumesProcessed}`);
  console.log(`Distinct users: ${report.overview.distinctUsers}`);

  await writeFile(values.out, exportUsageReportCsv(report));
  console.log(`Usage report written to ${values.out}`);
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      log.error('Unexpected failure', error);
      process.exitCode = 1;
    });
}
