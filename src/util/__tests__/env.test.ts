import { DynamoTable, getDynamoTableName } from "../../util/dynamodb";
import {
  getBoolean,
  getEnvVar,
  getNumber,
  getStage,
  getString,
  isLocal,
  isTest,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with APP_STAGE", () => {
    process.env.APP_STAGE = "prod";
    expect(getStage()).toBe("prod");
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("isLocal is false on CI runners", () => {
    process.env.CI = "true";
    expect(isLocal()).toBe(false);
    delete process.env.CI;
    delete process.env.KUBERNETES_SERVICE_HOST;
    expect(isLocal()).toBe(true);
  });

  test("isTest detects the jest worker", () => {
    expect(isTest()).toBe(true);
  });

  test("getEnvVar returns default when missing", () => {
    const value = getEnvVar("UNKNOWN_VAR", {
      defaultValue: "abc",
      parse: (raw) => raw,
    });
    expect(value).toBe("abc");
  });

  test("getEnvVar throws for a missing required value", () => {
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
    process.env.NODE_ENV = "test";
    expect(() =>
      getEnvVar("MISSING_KEY", { required: true, parse: (raw) => raw })
    ).toThrow("Missing required env var: MISSING_KEY__dev or MISSING_KEY");
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.APP_STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getString("MY_KEY")).toBe("staged");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "true";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
  });

  test("number parser rejects garbage", () => {
    process.env.NUMBER_KEY = "forty";
    expect(() => getNumber("NUMBER_KEY")).toThrow(
      "Env var NUMBER_KEY is not a number: forty"
    );
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
  });

  test("dynamo table name composition with defaults", () => {
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
    process.env.NODE_ENV = "development";
    delete process.env.APP_NAME;
    expect(getDynamoTableName(DynamoTable.ReportCache)).toBe(
      "equity-report-dev-ReportCacheTable"
    );
  });

  test("dynamo table name composition with overrides", () => {
    process.env.APP_STAGE = "prod";
    process.env.APP_NAME = "myapp";
    expect(getDynamoTableName(DynamoTable.ReportCache)).toBe(
      "myapp-prod-ReportCacheTable"
    );
  });
});
