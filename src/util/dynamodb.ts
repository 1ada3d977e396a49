import { getStage } from "./env";

export enum DynamoTable {
  ReportCache = "ReportCache",
}

interface GetDynamoTableNameOptions {
  appName?: string;
  stage?: string;
}

function resolveAppName(): string {
  // Prefer explicit APP_NAME from env; default to project name for convenience
  return process.env.APP_NAME || "equity-report";
}

const TABLE_SUFFIX: Record<DynamoTable, string> = {
  [DynamoTable.ReportCache]: "ReportCacheTable",
};

export function getDynamoTableName(
  table: DynamoTable,
  options: GetDynamoTableNameOptions = {}
): string {
  const appName = options.appName ?? resolveAppName();
  const stage = options.stage ?? getStage();

  return `${appName}-${stage}-${TABLE_SUFFIX[table]}`;
}
