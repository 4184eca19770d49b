//crawlcore/client/ClientMirror.ts

import { cloneSnapshot, GameStateSnapshot } from "../shared/GameState";
import {
  ClientMessageType,
  createMessage,
  isMessage,
  Message,
  MessagePayloads,
} from "../shared/messages";
import { CodecError, ConnectionError } from "../shared/errors";
import { END_OF_STREAM, MessageTransport, TransportOptions } from "../net/Transport";
import { FramedTransport } from "../net/FramedTransport";
import { Logger } from "../utils/logger";
import { EventHandler, TypedEventBus } from "./EventBus";

const log = Logger.scope("MIRROR");

export interface DisconnectedEvent {
  reason: string;
}

/** Every wire message kind plus the local `disconnected` notification. */
export interface MirrorEvents extends MessagePayloads {
  disconnected: DisconnectedEvent;
}

/**
 * Client-side read-only copy of the host's snapshot.
 *
 * A receive worker replaces the cached snapshot wholesale on `welcome` and
 * `game_state`, then dispatches the message to handlers registered for its
 * type. Readers get copies, so nothing outside ever sees a half-applied
 * update. The mirror never reconnects by itself.
 */
export class ClientMirror {
  private cache: GameStateSnapshot | null = null;
  private assignedId: number | null = null;
  private isConnected = false;
  private disconnectReason: string | null = null;
  private localClose = false;
  private worker: Promise<void> | null = null;

  private readonly bus = new TypedEventBus<MirrorEvents>((kind, err) => {
    log.error("Mirror handler threw", { kind: String(kind), err });
  });

  /** Date.now() when the cached snapshot was last replaced. */
  lastStateAt: number | null = null;
  statesReceived = 0;

  constructor(private readonly transport: MessageTransport) {}

  /** Dial a host and start the receive worker. Rejects with ConnectionError. */
  static async connect(
    host: string,
    port: number,
    opts: Partial<TransportOptions> = {},
  ): Promise<ClientMirror> {
    const transport = await FramedTransport.connect(host, port, opts);
    const mirror = ClientMirror.attach(transport);
    log.info("Connected to host", { host, port });
    return mirror;
  }

  /** Mirror an already connected transport and start its receive worker. */
  static attach(transport: MessageTransport): ClientMirror {
    const mirror = new ClientMirror(transport);
    mirror.start();
    return mirror;
  }

  start(): void {
    if (this.worker) return;
    this.isConnected = true;
    this.worker = this.receiveLoop();
  }

  get connected(): boolean {
    return this.isConnected;
  }

  /** Id from `welcome`; null until it arrives. */
  get playerId(): number | null {
    return this.assignedId;
  }

  // ---------------------------------------------------------------------------
  // Event bus
  // ---------------------------------------------------------------------------

  on<K extends keyof MirrorEvents>(kind: K, handler: EventHandler<MirrorEvents[K]>): () => void {
    return this.bus.on(kind, handler);
  }

  once<K extends keyof MirrorEvents>(kind: K, handler: EventHandler<MirrorEvents[K]>): () => void {
    return this.bus.once(kind, handler);
  }

  off<K extends keyof MirrorEvents>(kind: K, handler: EventHandler<MirrorEvents[K]>): void {
    this.bus.off(kind, handler);
  }

  // ---------------------------------------------------------------------------
  // Snapshot access
  // ---------------------------------------------------------------------------

  /** Copy of the latest snapshot, or null before `welcome`. */
  getSnapshot(): GameStateSnapshot | null {
    return this.cache ? cloneSnapshot(this.cache) : null;
  }

  /**
   * Resolve with the assigned id once `welcome` has been applied. Rejects with
   * ConnectionError if the connection ends first or the wait times out.
   */
  waitForWelcome(timeoutMs = 5_000): Promise<number> {
    const assigned = this.assignedId;
    if (assigned !== null) return Promise.resolve(assigned);
    if (!this.isConnected) {
      return Promise.reject(new ConnectionError(`Not connected: ${this.disconnectReason ?? "not started"}`));
    }

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        offWelcome();
        offDisconnect();
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new ConnectionError(`No welcome within ${timeoutMs}ms`));
      }, timeoutMs);
      const offWelcome = this.bus.on("welcome", (payload) => {
        cleanup();
        resolve(payload.player_id);
      });
      const offDisconnect = this.bus.on("disconnected", ({ reason }) => {
        cleanup();
        reject(new ConnectionError(`Disconnected before welcome: ${reason}`));
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Outbound intents
  // ---------------------------------------------------------------------------

  /**
   * Submit an intent to the host. Returns false when it could not be sent;
   * a connection failure also marks the mirror disconnected.
   */
  async send<T extends ClientMessageType>(type: T, payload: MessagePayloads[T]): Promise<boolean> {
    if (!this.isConnected) return false;

    try {
      await this.transport.send(createMessage(type, payload));
      return true;
    } catch (err) {
      if (err instanceof ConnectionError) {
        log.warn("Send failed; disconnecting", { type, error: err.message });
        this.transport.close();
        this.markDisconnected(err.message);
        return false;
      }
      if (err instanceof CodecError) {
        log.warn("Intent does not match schema; not sent", { type, error: err.message });
        return false;
      }
      throw err;
    }
  }

  /** Close locally. The `disconnected` event still fires once. */
  disconnect(): void {
    if (!this.isConnected) return;
    this.localClose = true;
    this.transport.close();
    this.markDisconnected("local_disconnect");
  }

  /** Resolves when the receive worker has exited. */
  closed(): Promise<void> {
    return this.worker ?? Promise.resolve();
  }

  // ---------------------------------------------------------------------------
  // Receive worker
  // ---------------------------------------------------------------------------

  private async receiveLoop(): Promise<void> {
    let reason = "end_of_stream";

    try {
      while (this.isConnected) {
        const next = await this.transport.receive();
        if (next === END_OF_STREAM) break;
        this.apply(next);
      }
    } catch (err) {
      if (!(err instanceof ConnectionError)) {
        log.error("Unexpected receive failure", { err });
      }
      reason = this.localClose ? "local_disconnect" : err instanceof Error ? err.message : String(err);
    }

    this.transport.close();
    this.markDisconnected(reason);
  }

  private apply(message: Message): void {
    if (isMessage(message, "welcome")) {
      this.assignedId = message.payload.player_id;
      this.replaceCache(message.payload.game_state);
      log.info("Assigned player id", { playerId: this.assignedId });
    } else if (isMessage(message, "game_state")) {
      this.replaceCache(message.payload);
    }

    this.bus.emit(message.type, message.payload);
  }

  private replaceCache(state: GameStateSnapshot): void {
    this.cache = cloneSnapshot(state);
    this.lastStateAt = Date.now();
    this.statesReceived++;
  }

  private markDisconnected(reason: string): void {
    if (this.disconnectReason !== null) return;
    this.isConnected = false;
    this.disconnectReason = reason;

    log.info("Disconnected from host", { reason });
    this.bus.emit("disconnected", { reason });
  }
}
