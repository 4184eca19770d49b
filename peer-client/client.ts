// peer-client/client.ts
/* eslint-disable no-console */

import { loadDotEnv } from "../crawlcore/config/env";
import { DEFAULT_PORT } from "../crawlcore/config/netConfig";
import { ClientMirror } from "../crawlcore/client/ClientMirror";
import type { PlayerView } from "../crawlcore/shared/GameState";
import { Logger } from "../crawlcore/utils/logger";

const log = Logger.scope("PEER");

function usage(): void {
  console.log(`
Dungeon LAN peer (headless)

Usage:
  tsx peer-client/client.ts [options]

Options:
  --host <addr>        host to join (default: 127.0.0.1, or CRAWL_PEER_HOST)
  --port <n>           host port (default: ${DEFAULT_PORT}, or CRAWL_PORT)
  --name <name>        display name sent in player updates (default: Knight)
  --interval <ms>      player_update period (default: 100)
  --help
`.trim());
}

export function getFlag(argv: string[], name: string): string | null {
  const idx = argv.indexOf(name);
  if (idx === -1) return null;
  const v = argv[idx + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function parsePositiveInt(raw: string | null | undefined, fallback: number): number {
  const n = parseInt(raw ?? "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

/** A standing player view; a real game loop fills this from its own player. */
export function idlePlayerView(playerId: number, name: string): PlayerView {
  return {
    player_id: playerId,
    name,
    x: 0,
    y: 0,
    hp: 100,
    max_hp: 100,
    stamina: 100,
    max_stamina: 100,
    facing_angle: 0,
    is_attacking: false,
    is_blocking: false,
    is_sprinting: false,
    equipped: { weapon: null, shield: null, helmet: null, chestplate: null, greaves: null },
  };
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes("--help")) {
    usage();
    return;
  }

  loadDotEnv();

  const host = getFlag(argv, "--host") ?? process.env.CRAWL_PEER_HOST ?? "127.0.0.1";
  const port = parsePositiveInt(getFlag(argv, "--port") ?? process.env.CRAWL_PORT, DEFAULT_PORT);
  const name = getFlag(argv, "--name") ?? "Knight";
  const intervalMs = parsePositiveInt(getFlag(argv, "--interval"), 100);

  const mirror = await ClientMirror.connect(host, port);

  mirror.on("player_joined", ({ player_id }) => log.info("Player joined", { playerId: player_id }));
  mirror.on("player_left", ({ player_id }) => log.info("Player left", { playerId: player_id }));
  mirror.on("player_attack", ({ player_id, attack_data }) =>
    log.debug("Player attacked", { playerId: player_id, weapon: attack_data.weapon }),
  );
  mirror.on("enemy_died", ({ enemy_id, drops }) => log.info("Enemy died", { enemyId: enemy_id, drops }));
  mirror.on("item_picked_up", ({ item_id, player_id }) =>
    log.info("Item picked up", { itemId: item_id, playerId: player_id }),
  );

  const playerId = await mirror.waitForWelcome();
  const snapshot = mirror.getSnapshot();
  log.success("Joined host", {
    playerId,
    level: snapshot?.level,
    players: Object.keys(snapshot?.players ?? {}).length,
    enemies: Object.keys(snapshot?.enemies ?? {}).length,
  });

  const view = idlePlayerView(playerId, name);
  const timer = setInterval(() => {
    mirror.send("player_update", view).catch((err: unknown) => {
      log.error("player_update failed", { err });
    });
  }, intervalMs);

  mirror.once("disconnected", ({ reason }) => {
    clearInterval(timer);
    log.info("Host connection closed", { reason });
  });

  process.once("SIGINT", () => mirror.disconnect());

  await mirror.closed();
}

if (require.main === module) {
  main().catch((err: unknown) => {
    log.error("Peer failed", { err });
    process.exit(1);
  });
}
