import { stringify } from 'csv-stringify/sync';
import { EvaluationRecord } from '../models/evaluation';

export const EvaluationColumns = [
  'Candidate Name',
  'Email',
  'Score',
  'Match',
  'Skills Found',
  'Rationale',
] as const;

export type EvaluationColumn = (typeof EvaluationColumns)[number];
export type EvaluationRow = Record<EvaluationColumn, string | number>;

export interface EvaluationTable {
  columns: readonly EvaluationColumn[];
  rows: EvaluationRow[];
}

/**
 * Highest score first. The sort is stable, candidates with equal scores keep their submission order.
 */
export function rankCandidates(records: readonly EvaluationRecord[]): EvaluationRecord[] {
  return [...records].sort((a, b) => b.score - a.score);
}

export function toEvaluationTable(records: readonly EvaluationRecord[]): EvaluationTable {
  return {
    columns: EvaluationColumns,
    rows: records.map((record) => ({
      'Candidate Name': record.candidateName,
      Email: record.email ?? '',
      Score: record.score,
      Match: record.match ? 'Yes' : 'No',
      'Skills Found': record.skills.join(', '),
      Rationale: record.rationale,
    })),
  };
}

/**
 * UTF-8 CSV with a header row, in the order the records are given.
 */
export function exportEvaluationsCsv(records: readonly EvaluationRecord[]): Buffer {
  const table = toEvaluationTable(records);
  return Buffer.from(stringify(table.rows, { header: true, columns: [...table.columns] }), 'utf-8');
}
