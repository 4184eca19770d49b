//crawlcore/core/SessionManager.ts

import { Session } from "../shared/Session";
import { createMessage, Message } from "../shared/messages";
import { CapacityExceeded, CodecError, ConnectionError } from "../shared/errors";
import { END_OF_STREAM, MessageTransport } from "../net/Transport";
import { encodeMessageFrame } from "../protocol/MessageCodec";
import { Logger } from "../utils/logger";
import type { StateStore } from "./StateStore";

const log = Logger.scope("SESSIONS");

/** Receives every decoded message a session sends, in stream order. */
export interface InboundHandler {
  handle(session: Session, message: Message): void;
}

export interface SessionManagerOptions {
  maxPlayers: number;
}

export class SessionManager {
  private readonly sessions = new Map<number, Session>();
  private readonly loops = new Map<number, Promise<void>>();
  private nextPlayerId = 0;
  private shuttingDown = false;
  private inbound: InboundHandler | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly opts: SessionManagerOptions,
  ) {}

  /** The router is built after the registry, so it is attached afterwards. */
  bindInbound(handler: InboundHandler): void {
    this.inbound = handler;
  }

  // ---------------------------------------------------------------------------
  // Accept
  // ---------------------------------------------------------------------------

  /**
   * Admit a freshly accepted connection.
   *
   * At capacity (or while shutting down) the transport is closed and null is
   * returned; no id is spent. Otherwise the session gets the next id, a
   * `welcome` with the current snapshot, and every other session hears
   * `player_joined`. The welcome frame is written before the session can be
   * reached by any broadcast, so it always precedes the first `game_state`.
   * If the welcome cannot be encoded the connection is closed unregistered
   * and null is returned; the id is not reused.
   */
  accept(transport: MessageTransport): Session | null {
    if (this.shuttingDown || this.sessions.size >= this.opts.maxPlayers) {
      const rejection = new CapacityExceeded(transport.address, this.opts.maxPlayers);
      log.info("Connection rejected", {
        address: transport.address,
        code: rejection.code,
        live: this.sessions.size,
        shuttingDown: this.shuttingDown,
      });
      transport.close();
      return null;
    }

    const id = this.nextPlayerId++;
    const now = Date.now();
    const session: Session = {
      id,
      transport,
      address: transport.address,
      connectedAt: now,
      lastSeen: now,
    };

    let welcome: Buffer;
    try {
      welcome = encodeMessageFrame(
        createMessage("welcome", { player_id: id, game_state: this.store.snapshot() }),
      );
    } catch (err) {
      if (!(err instanceof CodecError)) throw err;
      log.error("Cannot encode welcome; connection closed", {
        playerId: id,
        address: transport.address,
        error: err.message,
      });
      transport.close();
      return null;
    }

    this.sessions.set(id, session);
    session.transport.sendFrame(welcome).catch((err: unknown) => {
      this.onSendFailure(id, "welcome", err);
    });
    this.broadcast(createMessage("player_joined", { player_id: id }), id);

    log.info("Player connected", { playerId: id, address: session.address, live: this.sessions.size });

    const loop = this.receiveLoop(session);
    this.loops.set(id, loop);
    loop.finally(() => this.loops.delete(id)).catch((err) => {
      log.error("Receive loop bookkeeping failed", { playerId: id, err });
    });

    return session;
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  get(id: number): Session | undefined {
    return this.sessions.get(id);
  }

  ids(): number[] {
    return Array.from(this.sessions.keys());
  }

  count(): number {
    return this.sessions.size;
  }

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  /** Send to one session; a connection failure schedules its removal. */
  send(session: Session, message: Message): void {
    session.transport.send(message).catch((err: unknown) => {
      this.onSendFailure(session.id, message.type, err);
    });
  }

  sendTo(id: number, message: Message): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.send(session, message);
    return true;
  }

  /**
   * Encode once and send to every live session except `excludeId`.
   * Returns how many sessions the frame was handed to.
   */
  broadcast(message: Message, excludeId?: number): number {
    let frame: Buffer;
    try {
      frame = encodeMessageFrame(message);
    } catch (err) {
      log.error("Cannot encode broadcast; dropped", { type: message.type, err });
      return 0;
    }
    return this.broadcastFrame(frame, message.type, excludeId);
  }

  /**
   * Hand a pre-encoded frame to each session independently. A slow or broken
   * peer only affects itself: its failure schedules its own removal.
   */
  broadcastFrame(frame: Buffer, label: string, excludeId?: number): number {
    let targeted = 0;
    for (const session of Array.from(this.sessions.values())) {
      if (excludeId !== undefined && session.id === excludeId) continue;
      targeted++;
      session.transport.sendFrame(frame).catch((err: unknown) => {
        this.onSendFailure(session.id, label, err);
      });
    }
    return targeted;
  }

  private onSendFailure(id: number, label: string, err: unknown): void {
    if (err instanceof ConnectionError) {
      log.warn("Send failed; removing session", { playerId: id, type: label, error: err.message });
      this.remove(id, "send_failed");
      return;
    }
    if (err instanceof CodecError) {
      log.warn("Message could not be encoded; dropped", { playerId: id, type: label, error: err.message });
      return;
    }
    log.error("Unexpected send failure", { playerId: id, type: label, err });
  }

  // ---------------------------------------------------------------------------
  // Receive loop
  // ---------------------------------------------------------------------------

  private async receiveLoop(session: Session): Promise<void> {
    let reason = "end_of_stream";

    try {
      while (!this.shuttingDown && this.sessions.has(session.id)) {
        const next = await session.transport.receive();
        if (next === END_OF_STREAM) break;

        session.lastSeen = Date.now();
        this.dispatch(session, next);
      }
    } catch (err) {
      if (err instanceof ConnectionError) {
        reason = "connection_lost";
        log.debug("Receive failed", { playerId: session.id, error: err.message });
      } else {
        reason = "receive_error";
        log.error("Unexpected receive failure", { playerId: session.id, err });
      }
    }

    this.remove(session.id, reason);
  }

  private dispatch(session: Session, message: Message): void {
    if (!this.inbound) {
      log.warn("No inbound handler bound; message dropped", {
        playerId: session.id,
        type: message.type,
      });
      return;
    }

    try {
      this.inbound.handle(session, message);
    } catch (err) {
      log.error("Inbound handler threw; message dropped", {
        playerId: session.id,
        type: message.type,
        err,
      });
    }
  }

  /** Resolves once the session's receive loop has finished (immediately if none). */
  whenClosed(id: number): Promise<void> {
    return this.loops.get(id) ?? Promise.resolve();
  }

  // ---------------------------------------------------------------------------
  // Removal / cleanup
  // ---------------------------------------------------------------------------

  /**
   * Drop a session: close its transport, delete its player entry, and tell the
   * remaining sessions. Idempotent; duplicate failure signals for one session
   * never produce a second `player_left`.
   */
  remove(id: number, reason = "removed"): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;

    this.sessions.delete(id);
    session.transport.close();
    this.store.removePlayer(id);

    log.info("Player disconnected", { playerId: id, reason, live: this.sessions.size });

    if (!this.shuttingDown) {
      this.broadcast(createMessage("player_left", { player_id: id }));
    }
    return true;
  }

  /** Close every session without `player_left` and wait for the receive loops. */
  async closeAll(): Promise<void> {
    this.shuttingDown = true;
    for (const id of this.ids()) {
      this.remove(id, "shutdown");
    }
    await Promise.all(Array.from(this.loops.values()));
  }
}
