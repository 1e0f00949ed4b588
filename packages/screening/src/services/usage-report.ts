import { stringify } from 'csv-stringify/sync';
import { UsageLogDocument } from '../models/usage-log';
import { UserDocument } from '../models/user';

export const UsageReportColumns = ['Email', 'Role', 'Usage Count', 'Resumes Processed', 'Timestamp'] as const;

export type UsageReportColumn = (typeof UsageReportColumns)[number];
export type UsageReportRow = Record<UsageReportColumn, string | number>;

export interface UsageOverview {
  totalResumesProcessed: number;
  distinctUsers: number;
}

export interface UsageReport {
  overview: UsageOverview;
  rows: UsageReportRow[];
}

/**
 * Join users with their usage logs. A user without logs still gets one row with empty usage cells;
 * logs of unknown users are counted in the overview only.
 */
export function buildUsageReport(users: readonly UserDocument[], logs: readonly UsageLogDocument[]): UsageReport {
  const logsByEmail = new Map<string, UsageLogDocument[]>();
  for (const entry of logs) {
    const entries = logsByEmail.get(entry.userEmail) ?? [];
    entries.push(entry);
    logsByEmail.set(entry.userEmail, entries);
  }

  const rows = users.flatMap((user): UsageReportRow[] => {
    const userLogs = logsByEmail.get(user.email) ?? [];
    const base = { Email: user.email, Role: user.role, 'Usage Count': user.loginCount };
    if (userLogs.length === 0) {
      return [{ ...base, 'Resumes Processed': '', Timestamp: '' }];
    }
    return userLogs.map((entry) => ({
      ...base,
      'Resumes Processed': entry.resumesProcessed,
      Timestamp: entry.timestamp,
    }));
  });

  return {
    overview: {
      totalResumesProcessed: logs.reduce((total, entry) => total + entry.resumesProcessed, 0),
      distinctUsers: logsByEmail.size,
    },
    rows,
  };
}

export function exportUsageReportCsv(report: UsageReport): Buffer {
  const csv = stringify(report.rows, { header: true, columns: [...UsageReportColumns] });
  return Buffer.from(csv, 'utf-8');
}
