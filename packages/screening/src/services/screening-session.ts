import { defaultLogger } from '@resume-screener/integration';
import { retrieveContactDetails } from '../common/contact-details';
import { errorMessage, GenerationError } from '../common/errors';
import { err, ok, Result } from '../common/result';
import { TextExtractor } from '../extraction/text-extractor';
import { EvaluationRecord, UnknownCandidateName } from '../models/evaluation';
import { QAPair } from '../models/interview-qa';
import { ResumeDocument } from '../models/resume-document';
import { EvaluationService } from './evaluation.service';
import { InterviewQaService } from './interview-qa.service';
import { rankCandidates } from './ranking';
import { UsageAnalytics } from './usage-analytics.service';

const log = defaultLogger({ serviceName: 'screening-session' });

export interface DocumentError {
  fileName: string;
  message: string;
}

export interface CandidateBatch {
  jobDescription: string;
  /** Ranked by score, highest first */
  records: EvaluationRecord[];
  resumeTexts: Map<string, string>;
  errors: DocumentError[];
  attempted: number;
}

interface CandidateQa {
  candidate: string;
  pairs: QAPair[];
}

export interface ScreeningSessionDependencies {
  extractor: TextExtractor;
  evaluator: EvaluationService;
  qaService: InterviewQaService;
  analytics: UsageAnalytics;
}

export interface ScreeningSessionOptions {
  /** Fill a missing email or an unknown name from the resume text */
  contactFallback?: boolean;
}

/**
 * State of one user's screening work: the last evaluated batch, the selected candidate and their Q&A.
 */
export class ScreeningSession {
  private batch: CandidateBatch | null = null;
  private selection: string | null = null;
  private qa: CandidateQa | null = null;

  constructor(
    private readonly deps: ScreeningSessionDependencies,
    readonly userEmail: string,
    private readonly options: ScreeningSessionOptions = {},
  ) {}

  get currentBatch(): CandidateBatch | null {
    return this.batch;
  }

  /**
   * Q&A of the currently selected candidate, null when none was generated for them.
   */
  get interviewQa(): QAPair[] | null {
    if (this.qa == null || this.qa.candidate !== this.selectedCandidate) {
      return null;
    }
    return this.qa.pairs;
  }

  get selectedCandidate(): string | null {
    if (this.batch == null || this.batch.records.length === 0) {
      return null;
    }
    const selection = this.selection;
    if (selection != null && this.batch.records.some((record) => record.candidateName === selection)) {
      return selection;
    }
    return this.batch.records[0].candidateName;
  }

  selectCandidate(name: string): boolean {
    if (this.batch == null || !this.batch.records.some((record) => record.candidateName === name)) {
      return false;
    }
    this.selection = name;
    return true;
  }

  /**
   * Extract and evaluate every document in order. A failing document is recorded and skipped.
   */
  async evaluateBatch(jobDescription: string, documents: readonly ResumeDocument[]): Promise<CandidateBatch> {
    this.batch = null;
    this.qa = null;

    const evaluated: { record: EvaluationRecord; text: string }[] = [];
    const errors: DocumentError[] = [];

    for (const document of documents) {
      try {
        const text = await this.deps.extractor.extract(document);
        const record = await this.deps.evaluator.evaluate(jobDescription, text);
        evaluated.push({ record: this.applyContactFallback(record, text), text });
      } catch (error) {
        const message = `Failed to process ${document.name}: ${errorMessage(error)}`;
        log.error(message);
        errors.push({ fileName: document.name, message });
      }
    }

    const resumeTexts = new Map<string, string>();
    evaluated.forEach(({ record, text }) => resumeTexts.set(record.candidateName, text));

    const batch: CandidateBatch = {
      jobDescription,
      records: rankCandidates(evaluated.map(({ record }) => record)),
      resumeTexts,
      errors,
      attempted: documents.length,
    };
    this.batch = batch;

    if (batch.records.length > 0) {
      try {
        await this.deps.analytics.logUsage(this.userEmail, documents.length);
      } catch (error) {
        log.error(`Failed to log usage for ${this.userEmail}: ${errorMessage(error)}`);
      }
    }

    log.info(`Evaluated ${batch.records.length} of ${documents.length} resume(s)`);
    return batch;
  }

  /**
   * Generate interview Q&A for the selected candidate. Every attempt replaces the stored pairs,
   * a failed one leaves none. The result is discarded when another batch was evaluated meanwhile.
   */
  async generateInterviewQa(): Promise<Result<QAPair[], GenerationError>> {
    const batch = this.batch;
    const candidate = this.selectedCandidate;
    const resumeText = candidate != null ? batch?.resumeTexts.get(candidate) : undefined;
    if (batch == null || candidate == null || resumeText == null) {
      return err({ kind: 'EmptyContent', message: 'Evaluate resumes and select a candidate first.' });
    }

    this.qa = null;
    const result = await this.deps.qaService.generateQa(batch.jobDescription, resumeText);
    if (this.batch !== batch) {
      log.warn(`Discarding interview Q&A for ${candidate}, a new batch was evaluated`);
      return err({ kind: 'EmptyContent', message: 'The candidates changed while generating, generate again.' });
    }
    if (!result.ok) {
      return result;
    }
    this.qa = { candidate, pairs: result.value };
    return ok(result.value);
  }

  private applyContactFallback(record: EvaluationRecord, text: string): EvaluationRecord {
    if (!this.options.contactFallback || (record.email != null && record.candidateName !== UnknownCandidateName)) {
      return record;
    }
    const contact = retrieveContactDetails(text);
    return {
      ...record,
      candidateName:
        record.candidateName === UnknownCandidateName && contact.name.length > 0 ? contact.name : record.candidateName,
      email: record.email ?? contact.email,
    };
  }
}
