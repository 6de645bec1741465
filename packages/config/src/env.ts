export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal';

  /** Exit with status 1 when at least one review file failed. */
  strictExit: boolean;
}>;

type EnvSource = Record<string, string | undefined>;

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  const normalized = (value ?? 'development').trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new Error(`Invalid NODE_ENV: ${normalized}`);
}

function parseLogLevel(value: string | undefined): AppEnv['logLevel'] {
  const normalized = (value ?? 'info').trim();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new Error(`Invalid LOG_LEVEL: ${normalized}`);
}

function parseBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;

  const v = raw.toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  throw new Error(`Invalid ${key}: ${raw}`);
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  const nodeEnv = parseNodeEnv(env['NODE_ENV']);
  const logLevel = parseLogLevel(env['LOG_LEVEL']);
  const strictExit = parseBoolean(env, 'REVIEWS_STRICT_EXIT', false);

  return {
    nodeEnv,
    logLevel,
    strictExit,
  };
}
