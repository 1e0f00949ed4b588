import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  PutCommandOutput,
  QueryCommand,
  QueryCommandInput,
  QueryCommandOutput,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { Config } from '../config';

let documentClient: DynamoDBDocumentClient | null = null;

function getDocumentClient(): DynamoDBDocumentClient {
  if (documentClient == null) {
    documentClient = DynamoDBDocumentClient.from(new DynamoDBClient(), {
      marshallOptions: {
        removeUndefinedValues: true,
        convertEmptyValues: false,
      },
    });
  }
  return documentClient;
}

export interface MainTableKeys {
  pk: string;
  sk: string;
}

export interface DdbDocument {
  createdAt?: string;
  updatedAt?: string;
}

export type DdbItem = Record<string, unknown>;

export class DynamoDB {
  static async putDocument(
    document: MainTableKeys & DdbDocument,
    tableName = Config.getDataTableName(),
  ): Promise<PutCommandOutput> {
    const now = new Date().toISOString();
    return await getDocumentClient().send(
      new PutCommand({
        TableName: tableName,
        Item: { ...document, createdAt: document.createdAt ?? now, updatedAt: now },
      }),
    );
  }

  /**
   * Query following the pagination until every item is fetched.
   */
  static async queryAll(
    config: Omit<QueryCommandInput, 'TableName' | 'ExclusiveStartKey'>,
    tableName = Config.getDataTableName(),
  ): Promise<DdbItem[]> {
    const items: DdbItem[] = [];
    let exclusiveStartKey: DdbItem | undefined = undefined;
    do {
      const page: QueryCommandOutput = await getDocumentClient().send(
        new QueryCommand({
          ...config,
          TableName: tableName,
          ExclusiveStartKey: exclusiveStartKey,
        }),
      );
      items.push(...(page.Items ?? []));
      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey != null);

    return items;
  }

  /**
   * Atomically add the given amounts to numeric attributes, creating them when missing.
   */
  static async incrementCounters(
    key: MainTableKeys,
    counters: Record<string, number>,
    tableName = Config.getDataTableName(),
  ): Promise<void> {
    const names = Object.keys(counters);
    if (names.length === 0) {
      return;
    }

    await getDocumentClient().send(
      new UpdateCommand({
        TableName: tableName,
        Key: key,
        UpdateExpression: `ADD ${names.map((_, index) => `#c${index} :c${index}`).join(', ')} SET updatedAt = :now`,
        ExpressionAttributeNames: Object.fromEntries(names.map((name, index) => [`#c${index}`, name])),
        ExpressionAttributeValues: {
          ...Object.fromEntries(names.map((name, index) => [`:c${index}`, counters[name]])),
          ':now': new Date().toISOString(),
        },
      }),
    );
  }
}
