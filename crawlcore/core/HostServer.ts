//crawlcore/core/HostServer.ts

import net from "node:net";

import { DEFAULT_NET_CONFIG, NetworkConfig } from "../config/netConfig";
import { BindError } from "../shared/errors";
import { emptySnapshot, GameStateSnapshot, GameStateUpdate } from "../shared/GameState";
import { FramedTransport } from "../net/FramedTransport";
import { Logger } from "../utils/logger";
import { BroadcastLoop } from "./BroadcastLoop";
import type { HostContext } from "./HostContext";
import { MessageRouter } from "./MessageRouter";
import { SessionManager } from "./SessionManager";
import { DroppedIds, StateStore } from "./StateStore";

const log = Logger.scope("HOST");

export interface HostServerOptions {
  config?: Partial<NetworkConfig>;
  /** Snapshot from world generation; defaults to an empty level 1. */
  initialState?: GameStateSnapshot;
}

/**
 * The authoritative peer: listener, session registry, store, router and
 * broadcast loop wired into one HostContext.
 */
export class HostServer {
  readonly ctx: HostContext;

  private server: net.Server | null = null;
  private running = false;

  constructor(opts: HostServerOptions = {}) {
    const config: NetworkConfig = { ...DEFAULT_NET_CONFIG, ...opts.config };
    const store = new StateStore(opts.initialState ?? emptySnapshot());
    const sessions = new SessionManager(store, { maxPlayers: config.maxPlayers });
    const router = new MessageRouter(store, sessions);
    sessions.bindInbound(router);
    const broadcaster = new BroadcastLoop(store, sessions, { tickRate: config.tickRate });

    this.ctx = { config, store, sessions, router, broadcaster };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Bind and start broadcasting. Rejects with BindError; there is no retry. */
  async start(): Promise<void> {
    if (this.running) return;

    const { config } = this.ctx;
    const server = net.createServer((socket) => this.onConnection(socket));

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new BindError(config.host, config.port, err));
      };
      server.once("error", onError);
      server.listen(config.port, config.host, () => {
        server.off("error", onError);
        resolve();
      });
    });

    server.on("error", (err: Error) => {
      log.error("Listener error", { err });
    });

    this.server = server;
    this.running = true;
    this.ctx.broadcaster.start();

    log.success("Host listening", {
      host: config.host,
      port: this.address().port,
      maxPlayers: config.maxPlayers,
      tickRate: config.tickRate,
    });
  }

  /** Bound address; with port 0 this is where the ephemeral port shows up. */
  address(): net.AddressInfo {
    const addr = this.server?.address();
    if (!addr || typeof addr === "string") {
      return { address: this.ctx.config.host, family: "IPv4", port: this.ctx.config.port };
    }
    return addr;
  }

  /** Stop accepting, stop broadcasting, close every session. Idempotent. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.ctx.broadcaster.stop();

    const server = this.server;
    this.server = null;
    const closed = new Promise<void>((resolve) => {
      if (!server) return resolve();
      server.close(() => resolve());
    });

    await this.ctx.sessions.closeAll();
    await closed;

    log.info("Host stopped");
  }

  /**
   * Merge collaborator output (new level, enemy list, dropped items) into the
   * snapshot. Returns the retired ids that were left out. Throws CodecError,
   * keeping the current snapshot, when the result could not be sent to peers.
   */
  updateGameState(update: GameStateUpdate): DroppedIds {
    return this.ctx.store.merge(update).droppedIds;
  }

  getSnapshot(): GameStateSnapshot {
    return this.ctx.store.snapshot();
  }

  private onConnection(socket: net.Socket): void {
    const { config } = this.ctx;

    if (!this.running) {
      socket.destroy();
      return;
    }

    const transport = new FramedTransport(socket, {
      readTimeoutMs: config.readTimeoutMs,
      maxFrameBytes: config.maxFrameBytes,
      maxBufferedBytes: config.maxBufferedBytes,
      connectTimeoutMs: config.connectTimeoutMs,
    });

    this.ctx.sessions.accept(transport);
  }
}
