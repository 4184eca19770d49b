//crawlcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  HOST: "info",
  SESSIONS: "info",
  ROUTER: "info",
  BROADCAST: "info",
  STORE: "info",
  TRANSPORT: "info",
  MIRROR: "info",
  PEER: "info",
};

// Allow env overrides like LOG_SCOPE_ROUTER=debug, LOG_SCOPE_TRANSPORT=warn, etc.
// Read at call time so tests and entry points can change LOG_LEVEL after import.
export function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Global override beats the table
  const globalLevel = parseLevel(process.env.LOG_LEVEL);
  if (globalLevel) return globalLevel;

  // 3) Default table, then "info"
  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const effective = getScopeLevel(scope);
  return ORDER.indexOf(level) >= ORDER.indexOf(effective);
}
