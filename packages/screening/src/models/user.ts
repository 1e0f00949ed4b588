import { defaultLogger } from '@resume-screener/integration';
import { z } from 'zod';
import { DynamoDB, MainTableKeys } from '../integrations/dynamodb';

const log = defaultLogger({ serviceName: 'user-model' });

export function getUserKey(email: string): MainTableKeys {
  return {
    pk: 'USER',
    sk: email,
  };
}

export const UserDocumentSchema = z.object({
  pk: z.string(),
  sk: z.string(),
  email: z.string(),
  name: z.string().default(''),
  role: z.enum(['user', 'admin']).catch('user'),
  totalResumes: z.number().default(0),
  loginCount: z.number().default(0),
});

export type UserDocument = z.infer<typeof UserDocumentSchema>;

export class User {
  static async getAll(): Promise<UserDocument[]> {
    const items = await DynamoDB.queryAll({
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': 'USER' },
    });
    return items.map(parseUser).filter((user): user is UserDocument => user != null);
  }

  /**
   * Account a processed batch: adds the resumes to the total and counts one more usage.
   */
  static async recordUsage(email: string, processedCount: number): Promise<void> {
    await DynamoDB.incrementCounters(getUserKey(email), { totalResumes: processedCount, loginCount: 1 });
  }
}

function parseUser(item: Record<string, unknown>): UserDocument | null {
  const parsed = UserDocumentSchema.safeParse(item);
  if (!parsed.success) {
    log.warn(`Skipping malformed user document ${String(item.sk)}`);
    return null;
  }
  return parsed.data;
}
