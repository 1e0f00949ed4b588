import { EvaluationRecord } from '../../src/models/evaluation';
import { exportEvaluationsCsv, rankCandidates, toEvaluationTable } from '../../src/services/ranking';

function record(candidateName: string, score: number, overrides: Partial<EvaluationRecord> = {}): EvaluationRecord {
  return {
    candidateName,
    email: null,
    score,
    match: score >= 70,
    skills: [],
    rationale: 'Reviewed',
    ...overrides,
  };
}

describe('rankCandidates', () => {
  it('should sort by score descending and keep submission order for ties', () => {
    const records = [record('First', 40), record('Second', 90), record('Third', 90), record('Fourth', 10)];

    const ranked = rankCandidates(records);

    expect(ranked.map((r) => r.candidateName)).toEqual(['Second', 'Third', 'First', 'Fourth']);
    expect(records.map((r) => r.candidateName)).toEqual(['First', 'Second', 'Third', 'Fourth']);
  });

  it('should return an empty list for no records', () => {
    expect(rankCandidates([])).toEqual([]);
  });
});

describe('toEvaluationTable', () => {
  it('should render records as display rows', () => {
    const table = toEvaluationTable([
      record('Jane Doe', 85, { email: 'jane@x.com', skills: ['Python', 'SQL'], rationale: 'Strong fit' }),
      record('Unknown', 0),
    ]);

    expect(table.columns).toEqual(['Candidate Name', 'Email', 'Score', 'Match', 'Skills Found', 'Rationale']);
    expect(table.rows).toEqual([
      {
        'Candidate Name': 'Jane Doe',
        Email: 'jane@x.com',
        Score: 85,
        Match: 'Yes',
        'Skills Found': 'Python, SQL',
        Rationale: 'Strong fit',
      },
      {
        'Candidate Name': 'Unknown',
        Email: '',
        Score: 0,
        Match: 'No',
        'Skills Found': '',
        Rationale: 'Reviewed',
      },
    ]);
  });
});

describe('exportEvaluationsCsv', () => {
  it('should write a header row and quote fields containing commas', () => {
    const csv = exportEvaluationsCsv([
      record('Jane Doe', 85, { email: 'jane@x.com', skills: ['Python', 'SQL'], rationale: 'Strong fit' }),
    ]);

    expect(csv.toString('utf-8')).toBe(
      'Candidate Name,Email,Score,Match,Skills Found,Rationale\nJane Doe,jane@x.com,85,Yes,"Python, SQL",Strong fit\n',
    );
  });

  it('should escape quotes in the rationale', () => {
    const csv = exportEvaluationsCsv([record('John Smith', 40, { rationale: 'Lacks "hands-on" work' })]);

    expect(csv.toString('utf-8').split('\n')[1]).toBe('John Smith,,40,No,,"Lacks ""hands-on"" work"');
  });
});
