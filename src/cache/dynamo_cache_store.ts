/**
 * DynamoDB-backed cache store.
 *
 * Layout: pk = CACHE#<TICKER>, sk = <fingerprint>. `expiresAt` is epoch seconds so
 * the table's TTL attribute can reap stale items; reads still check it.
 */
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
} from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import {
  countRecord,
  emptyStats,
  type CacheRecord,
  type CacheStats,
  type CacheStore,
} from "./cache_store";

const cacheItemSchema = z.object({
  pk: z.string(),
  sk: z.string(),
  ticker: z.string(),
  source: z.string(),
  payload: z.string(),
  createdAt: z.number(),
  ttlSeconds: z.number(),
  expiresAt: z.number(),
});

const keySchema = z.object({ pk: z.string(), sk: z.string() });

const summarySchema = keySchema.extend({ ticker: z.string(), source: z.string() });

const PARTITION_PREFIX = "CACHE#";

export interface DynamoCacheStoreOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
}

export function cachePartitionKey(ticker: string): string {
  return `${PARTITION_PREFIX}${ticker.toUpperCase()}`;
}

export class DynamoCacheStore implements CacheStore {
  private readonly table: string;
  private readonly doc: DynamoDBDocumentClient;

  constructor(options: DynamoCacheStoreOptions) {
    this.table = options.tableName;
    this.doc =
      options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
  }

  get tableName(): string {
    return this.table;
  }

  async read(fingerprint: string): Promise<CacheRecord | undefined> {
    const ticker = tickerOf(fingerprint);
    if (!ticker) return undefined;
    const result = await this.doc.send(
      new GetCommand({
        TableName: this.table,
        Key: { pk: cachePartitionKey(ticker), sk: fingerprint },
      })
    );
    if (!result.Item) return undefined;
    const parsed = cacheItemSchema.safeParse(result.Item);
    if (!parsed.success) {
      await this.remove(fingerprint);
      throw new Error(
        `Malformed cache item for ${fingerprint}: ${parsed.error.message}`
      );
    }
    const item = parsed.data;
    return {
      fingerprint: item.sk,
      ticker: item.ticker,
      source: item.source,
      payload: JSON.parse(item.payload),
      createdAt: item.createdAt,
      ttlSeconds: item.ttlSeconds,
    };
  }

  async write(record: CacheRecord): Promise<void> {
    await this.doc.send(
      new PutCommand({
        TableName: this.table,
        Item: {
          pk: cachePartitionKey(record.ticker),
          sk: record.fingerprint,
          ticker: record.ticker,
          source: record.source,
          payload: JSON.stringify(record.payload),
          createdAt: record.createdAt,
          ttlSeconds: record.ttlSeconds,
          expiresAt: Math.ceil(record.createdAt / 1000) + record.ttlSeconds,
        },
      })
    );
  }

  async remove(fingerprint: string): Promise<void> {
    const ticker = tickerOf(fingerprint);
    if (!ticker) return;
    await this.doc.send(
      new DeleteCommand({
        TableName: this.table,
        Key: { pk: cachePartitionKey(ticker), sk: fingerprint },
      })
    );
  }

  async removeTicker(ticker: string): Promise<number> {
    const pk = cachePartitionKey(ticker);
    let removed = 0;
    let exclusiveStartKey: Record<string, unknown> | undefined;
    do {
      const page = await this.doc.send(
        new QueryCommand({
          TableName: this.table,
          KeyConditionExpression: "pk = :pk",
          ExpressionAttributeValues: { ":pk": pk },
          ProjectionExpression: "pk, sk",
          ExclusiveStartKey: exclusiveStartKey,
        })
      );
      for (const raw of page.Items ?? []) {
        const key = keySchema.safeParse(raw);
        if (!key.success) continue;
        await this.deleteKey(key.data);
        removed += 1;
      }
      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey);
    return removed;
  }

  async removeAll(): Promise<number> {
    let removed = 0;
    await this.scanCacheItems(async (item) => {
      await this.deleteKey(item);
      removed += 1;
    });
    return removed;
  }

  async stats(): Promise<CacheStats> {
    const stats = emptyStats();
    await this.scanCacheItems(async (item) => countRecord(stats, item));
    return stats;
  }

  private async deleteKey(key: { pk: string; sk: string }): Promise<void> {
    await this.doc.send(
      new DeleteCommand({ TableName: this.table, Key: { pk: key.pk, sk: key.sk } })
    );
  }

  // The table may hold other entity types; only CACHE# partitions are visited
  private async scanCacheItems(
    visit: (item: z.infer<typeof summarySchema>) => Promise<void>
  ): Promise<void> {
    let exclusiveStartKey: Record<string, unknown> | undefined;
    do {
      const page = await this.doc.send(
        new ScanCommand({
          TableName: this.table,
          FilterExpression: "begins_with(pk, :prefix)",
          ExpressionAttributeNames: { "#ticker": "ticker", "#source": "source" },
          ExpressionAttributeValues: { ":prefix": PARTITION_PREFIX },
          ProjectionExpression: "pk, sk, #ticker, #source",
          ExclusiveStartKey: exclusiveStartKey,
        })
      );
      for (const raw of page.Items ?? []) {
        const item = summarySchema.safeParse(raw);
        if (item.success) await visit(item.data);
      }
      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey);
  }
}

// Fingerprints end in ":<TICKER>:<hash>"
function tickerOf(fingerprint: string): string | undefined {
  const parts = fingerprint.split(":");
  if (parts.length < 3) return undefined;
  return parts[parts.length - 2] || undefined;
}
