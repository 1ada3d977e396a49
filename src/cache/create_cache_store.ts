import { ConfigurationError } from "../reporting/domain/errors";
import { DynamoTable, getDynamoTableName } from "../util/dynamodb";
import { MemoryCacheStore, type CacheStore } from "./cache_store";
import { DynamoCacheStore } from "./dynamo_cache_store";

/**
 * Builds a store from CACHE_URL: `memory://`, `dynamodb://<table>` or
 * `dynamodb://` for the stage's default table.
 */
export function createCacheStore(url: string): CacheStore {
  const match = /^([a-z]+):\/\/(.*)$/.exec(url.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid CACHE_URL: ${url}`, { url });
  }
  const [, scheme, rest] = match;
  switch (scheme) {
    case "memory":
      return new MemoryCacheStore();
    case "dynamodb": {
      const tableName = rest?.replace(/\/+$/, "") || getDynamoTableName(DynamoTable.ReportCache);
      return new DynamoCacheStore({ tableName });
    }
    default:
      throw new ConfigurationError(
        `Unsupported CACHE_URL scheme "${scheme}"; use memory:// or dynamodb://`,
        { url }
      );
  }
}
