export const MatchThreshold = 70;
export const UnknownCandidateName = 'Unknown';
export const DefaultRationale = 'No explanation provided.';

/**
 * Normalized outcome of one resume evaluation.
 */
export interface EvaluationRecord {
  readonly candidateName: string;
  readonly email: string | null;
  /** Integer from 0 to 100 */
  readonly score: number;
  /** Always `score >= MatchThreshold` */
  readonly match: boolean;
  readonly skills: readonly string[];
  readonly rationale: string;
}

export function isMatch(score: number): boolean {
  return score >= MatchThreshold;
}

/**
 * Zero-score record used when the evaluation could not be obtained or understood.
 */
export function sentinelRecord(rationale: string): EvaluationRecord {
  return {
    candidateName: UnknownCandidateName,
    email: null,
    score: 0,
    match: false,
    skills: [],
    rationale,
  };
}
