/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer an explicit APP_STAGE/STAGE; derive from NODE_ENV otherwise
  const explicit = process.env.APP_STAGE || process.env.STAGE;
  if (explicit && explicit.length > 0) return explicit;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || process.env.JEST_WORKER_ID != null;
}

export function isLocal(): boolean {
  // Containers and CI runners set one of these; a developer shell usually does not
  const isCi = process.env.CI === "true";
  const isContainer = Boolean(process.env.KUBERNETES_SERVICE_HOST);
  return !isCi && !isContainer;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse?: (raw: string) => T;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

function readRaw(name: string, stageAware: boolean): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];
  return candidate != null && candidate !== "" ? candidate : undefined;
}

/**
 * Reads an environment variable with sensible fallbacks and optional parsing.
 * - If `stageAware` is true, checks NAME__<stage> first (e.g., LLM_API_KEY__prod), then NAME.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> & { parse: (raw: string) => T }
): T | undefined {
  const stageAware = options.stageAware !== false; // default true
  const raw = readRaw(name, stageAware);

  if (raw !== undefined) {
    return options.parse(raw);
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar<string>(name, { defaultValue, parse: (raw) => raw });
}

function parseNumber(name: string) {
  return (raw: string): number => {
    const n = Number(raw);
    if (Number.isNaN(n))
      throw new Error(`Env var ${name} is not a number: ${raw}`);
    return n;
  };
}

export function getNumber(name: string, defaultValue: number): number;
export function getNumber(name: string): number | undefined;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar<number>(name, { defaultValue, parse: parseNumber(name) });
}

function parseBoolean(name: string) {
  return (raw: string): boolean => {
    const lowered = raw.toLowerCase();
    if (["1", "true", "yes", "y"].includes(lowered)) return true;
    if (["0", "false", "no", "n"].includes(lowered)) return false;
    throw new Error(`Env var ${name} is not a boolean: ${raw}`);
  };
}

export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(name: string): boolean | undefined;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar<boolean>(name, { defaultValue, parse: parseBoolean(name) });
}
