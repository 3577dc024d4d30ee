export type Env = Record<string, string | undefined>;

export type GatewayConfig = {
  apiBaseUrl: string;
  apiToken?: string;
  requestTimeoutMs: number;
  maxControlPages: number;
  sessionIdleTtlMs: number;
  ruleApiVersion: string;
  model: string;
  maxTurns: number;
  enableSubagents: boolean;
  claudeCodeExecutable?: string;
};

export const DEFAULT_API_BASE_URL = "http://localhost:8080/api/";
export const DEFAULT_RULE_API_VERSION = "rule.compliance/v1alpha1";
export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";

const TRUE_LITERALS = new Set(["1", "true", "yes", "on", "enabled"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off", "disabled"]);

type IntBounds = { min?: number; max?: number };

// Blank values count as unset.
function envValue(env: Env, name: string): string | undefined {
  const trimmed = env[name]?.trim();
  return trimmed ? trimmed : undefined;
}

/** Boolean flag; unrecognised literals fall back to the default. */
export function readBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = envValue(env, name)?.toLowerCase();
  if (value === undefined) return defaultValue;
  if (TRUE_LITERALS.has(value)) return true;
  if (FALSE_LITERALS.has(value)) return false;
  return defaultValue;
}

/**
 * Base-10 integer within `bounds` (inclusive, default min 1). Anything else,
 * including values past the safe integer range, yields the default.
 */
export function readInt(env: Env, name: string, defaultValue: number, bounds: IntBounds = { min: 1 }): number {
  const value = envValue(env, name);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) return defaultValue;
  if (bounds.min !== undefined && parsed < bounds.min) return defaultValue;
  if (bounds.max !== undefined && parsed > bounds.max) return defaultValue;
  return parsed;
}

export function readString(env: Env, name: string): string | undefined {
  return envValue(env, name);
}

// The base URL always ends with "/" so endpoint paths resolve beneath it.
function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  return {
    apiBaseUrl: withTrailingSlash(readString(env, "RULE_GATEWAY_API_URL") ?? DEFAULT_API_BASE_URL),
    apiToken: readString(env, "RULE_GATEWAY_API_TOKEN"),
    requestTimeoutMs: readInt(env, "RULE_GATEWAY_TIMEOUT_MS", 60_000),
    maxControlPages: readInt(env, "RULE_GATEWAY_MAX_PAGES", 10, { min: 1, max: 100 }),
    sessionIdleTtlMs: readInt(env, "RULE_GATEWAY_SESSION_TTL_MS", 3_600_000),
    ruleApiVersion: readString(env, "RULE_GATEWAY_RULE_API_VERSION") ?? DEFAULT_RULE_API_VERSION,
    model: readString(env, "CLAUDE_MODEL") ?? DEFAULT_MODEL,
    maxTurns: readInt(env, "RULE_GATEWAY_MAX_TURNS", 50),
    enableSubagents: readBool(env, "RULE_GATEWAY_ENABLE_SUBAGENTS", true),
    claudeCodeExecutable: readString(env, "CLAUDE_CODE_EXECUTABLE") ?? readString(env, "CLAUDE_CODE_PATH"),
  };
}
