// host-backend/server.ts

import { loadDotEnv } from "../crawlcore/config/env";
import { loadNetConfig } from "../crawlcore/config/netConfig";
import { HostServer } from "../crawlcore/core/HostServer";
import { emptySnapshot } from "../crawlcore/shared/GameState";
import { BindError } from "../crawlcore/shared/errors";
import { Logger } from "../crawlcore/utils/logger";
import { installFileLogTap } from "./FileLogTap";

const log = Logger.scope("HOST");

async function main(): Promise<void> {
  const envFile = loadDotEnv();
  installFileLogTap();

  const config = loadNetConfig();
  log.info("Starting dungeon host...", {
    host: config.host,
    port: config.port,
    maxPlayers: config.maxPlayers,
    tickRate: config.tickRate,
    envFile,
  });

  // World generation runs in the game process and merges its level through
  // updateGameState; the host starts from an empty level 1.
  const host = new HostServer({ config, initialState: emptySnapshot(1) });

  try {
    await host.start();
  } catch (err: unknown) {
    if (err instanceof BindError) {
      log.error("Cannot start host", { host: err.host, port: err.port, cause: err.cause });
      process.exit(1);
    }
    throw err;
  }

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal });
    host
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("Error during shutdown", { err });
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// Entry point
main().catch((err: unknown) => {
  log.error("Fatal error in dungeon host", { err });
  process.exit(1);
});
