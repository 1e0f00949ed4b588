import { defaultLogger } from '@resume-screener/integration';
import { UsageLog } from '../models/usage-log';
import { User } from '../models/user';

const log = defaultLogger({ serviceName: 'usage-analytics' });

export interface UsageAnalytics {
  logUsage(userEmail: string, processedCount: number): Promise<void>;
}

export class DynamoDbUsageAnalytics implements UsageAnalytics {
  async logUsage(userEmail: string, processedCount: number): Promise<void> {
    const entry = await UsageLog.insertNew({
      userEmail,
      resumesProcessed: processedCount,
      timestamp: new Date().toISOString(),
    });
    await User.recordUsage(userEmail, processedCount);
    log.info(`Logged usage of ${processedCount} resume(s) for ${userEmail}`, { sk: entry.sk });
  }
}
