//crawlcore/config/netConfig.ts

import { z } from "zod";

import { ConfigError } from "../shared/errors";

export interface NetworkConfig {
  host: string;
  port: number;
  maxPlayers: number;
  /** Full-snapshot broadcasts per second. */
  tickRate: number;
  readTimeoutMs: number;
  connectTimeoutMs: number;
  maxFrameBytes: number;
  maxBufferedBytes: number;
}

// Defaults (human readable)
export const DEFAULT_PORT = 5555;
export const DEFAULT_MAX_PLAYERS = 4;
export const DEFAULT_TICK_RATE = 30; // broadcasts per second
const DEFAULT_READ_TIMEOUT_MS = 5_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_FRAME_BYTES = 8 * 1024 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

export const DEFAULT_NET_CONFIG: NetworkConfig = {
  host: "0.0.0.0",
  port: DEFAULT_PORT,
  maxPlayers: DEFAULT_MAX_PLAYERS,
  tickRate: DEFAULT_TICK_RATE,
  readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
  maxBufferedBytes: DEFAULT_MAX_BUFFERED_BYTES,
};

const intFromEnv = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const envSchema = z.object({
  CRAWL_HOST: z.string().min(1).default(DEFAULT_NET_CONFIG.host),
  CRAWL_PORT: intFromEnv(0, 65_535).default(DEFAULT_NET_CONFIG.port),
  CRAWL_MAX_PLAYERS: intFromEnv(1, 64).default(DEFAULT_NET_CONFIG.maxPlayers),
  CRAWL_TICK_RATE: intFromEnv(1, 240).default(DEFAULT_NET_CONFIG.tickRate),
  CRAWL_READ_TIMEOUT_MS: intFromEnv(10, 600_000).default(DEFAULT_NET_CONFIG.readTimeoutMs),
  CRAWL_CONNECT_TIMEOUT_MS: intFromEnv(10, 600_000).default(DEFAULT_NET_CONFIG.connectTimeoutMs),
  CRAWL_MAX_FRAME_BYTES: intFromEnv(64, 0xffff_ffff).default(DEFAULT_NET_CONFIG.maxFrameBytes),
  CRAWL_MAX_BUFFERED_BYTES: intFromEnv(1024, 0xffff_ffff).default(DEFAULT_NET_CONFIG.maxBufferedBytes),
});

/**
 * Build the network config from environment variables.
 *
 * Empty strings count as unset so `CRAWL_PORT=` in a .env file keeps the default.
 */
export function loadNetConfig(env: Record<string, string | undefined> = process.env): NetworkConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid network configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    host: e.CRAWL_HOST,
    port: e.CRAWL_PORT,
    maxPlayers: e.CRAWL_MAX_PLAYERS,
    tickRate: e.CRAWL_TICK_RATE,
    readTimeoutMs: e.CRAWL_READ_TIMEOUT_MS,
    connectTimeoutMs: e.CRAWL_CONNECT_TIMEOUT_MS,
    maxFrameBytes: e.CRAWL_MAX_FRAME_BYTES,
    maxBufferedBytes: e.CRAWL_MAX_BUFFERED_BYTES,
  };
}

export function tickPeriodMs(cfg: Pick<NetworkConfig, "tickRate">): number {
  return 1000 / cfg.tickRate;
}
