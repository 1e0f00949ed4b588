import { defaultLogger } from '@resume-screener/integration';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { DynamoDB, MainTableKeys } from '../integrations/dynamodb';

const log = defaultLogger({ serviceName: 'usage-log-model' });

export function getUsageLogKey(timestamp: string, id: string): MainTableKeys {
  return {
    pk: 'USAGE',
    sk: `${timestamp}#${id}`,
  };
}

export const UsageLogDocumentSchema = z.object({
  pk: z.string(),
  sk: z.string(),
  userEmail: z.string(),
  resumesProcessed: z.number(),
  timestamp: z.string(),
});

export type UsageLogDocument = z.infer<typeof UsageLogDocumentSchema>;

export class UsageLog {
  static async insertNew(data: Omit<UsageLogDocument, 'pk' | 'sk'>): Promise<UsageLogDocument> {
    const item: UsageLogDocument = {
      ...getUsageLogKey(data.timestamp, uuid()),
      ...data,
    };

    await DynamoDB.putDocument(item);

    return item;
  }

  static async getAll(): Promise<UsageLogDocument[]> {
    const items = await DynamoDB.queryAll({
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': 'USAGE' },
    });

    const logs: UsageLogDocument[] = [];
    items.forEach((item) => {
      const parsed = UsageLogDocumentSchema.safeParse(item);
      if (parsed.success) {
        logs.push(parsed.data);
      } else {
        log.warn(`Skipping malformed usage log ${String(item.sk)}`);
      }
    });
    return logs;
  }
}
