// crawlcore/test/testUtils.ts

import { ConnectionError } from "../shared/errors";
import type { GameStateSnapshot, PlayerView } from "../shared/GameState";
import { isMessage, Message, MessageType } from "../shared/messages";
import { decodeMessage, encodeMessage, FRAME_HEADER_BYTES } from "../protocol/MessageCodec";
import { END_OF_STREAM, EndOfStream, MessageTransport } from "../net/Transport";

/**
 * In-process transport. Everything sent goes through the real codec and is
 * recorded decoded; inbound messages are queued with `deliver`.
 */
export class FakeTransport implements MessageTransport {
  readonly sent: Message[] = [];
  closeCalls = 0;
  /** When set, every send rejects with ConnectionError. */
  failSends = false;

  private open = true;
  private ended = false;
  private readonly inbox: Message[] = [];
  private readonly waiters: {
    resolve(v: Message | EndOfStream): void;
    reject(err: ConnectionError): void;
  }[] = [];

  constructor(readonly address = "127.0.0.1:40000") {}

  get isOpen(): boolean {
    return this.open && !this.ended;
  }

  send(message: Message): Promise<void> {
    let body: Buffer;
    try {
      body = encodeMessage(message);
    } catch (err) {
      return Promise.reject(err);
    }
    return this.record(body);
  }

  sendFrame(frame: Buffer): Promise<void> {
    return this.record(frame.subarray(FRAME_HEADER_BYTES));
  }

  receive(): Promise<Message | EndOfStream> {
    if (!this.open) return Promise.reject(new ConnectionError("fake transport closed"));
    const next = this.inbox.shift();
    if (next) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(END_OF_STREAM);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  close(): void {
    this.closeCalls++;
    if (!this.open) return;
    this.open = false;
    for (const w of this.waiters.splice(0)) w.reject(new ConnectionError("fake transport closed"));
  }

  /** Queue a message as if the peer had sent it. */
  deliver(message: Message): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(message);
    else this.inbox.push(message);
  }

  /** Peer closes its side. */
  end(): void {
    this.ended = true;
    for (const w of this.waiters.splice(0)) w.resolve(END_OF_STREAM);
  }

  sentOfType<T extends MessageType>(type: T): Message<T>[] {
    const out: Message<T>[] = [];
    for (const m of this.sent) {
      if (isMessage(m, type)) out.push(m);
    }
    return out;
  }

  private record(body: Buffer): Promise<void> {
    if (!this.open || this.failSends) {
      return Promise.reject(new ConnectionError(`fake send to ${this.address} failed`));
    }
    this.sent.push(decodeMessage(body));
    return Promise.resolve();
  }
}

/** Let pending promise callbacks and receive loops run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2_000,
  stepMs = 5,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, stepMs));
  }
}

export function makePlayer(playerId: number, overrides: Partial<PlayerView> = {}): PlayerView {
  return {
    player_id: playerId,
    name: `Knight ${playerId}`,
    x: 100,
    y: 200,
    hp: 100,
    max_hp: 100,
    stamina: 80,
    max_stamina: 100,
    facing_angle: 1.5,
    is_attacking: false,
    is_blocking: false,
    is_sprinting: false,
    equipped: {
      weapon: { item_type: "weapon", item_class: "sword", name: "Sword" },
      shield: null,
    },
    ...overrides,
  };
}

/** One ant at 60 hp, one dropped sword, empty player map. */
export function makeSnapshot(): GameStateSnapshot {
  return {
    players: {},
    enemies: {
      "7": { id: 7, type: "ant", x: 320, y: 240, hp: 60, max_hp: 60, state: "idle", room_id: 2 },
    },
    items: {
      "3": { item_id: 3, item_type: "weapon", item_class: "spear", name: "Spear", x: 50, y: 60 },
    },
    dungeon: {
      level: 1,
      room_count: 2,
      rooms: [
        {
          room_id: 1,
          x: 0,
          y: 0,
          width: 400,
          height: 400,
          cleared: true,
          connected_rooms: [2],
          center: [200, 200],
        },
        {
          room_id: 2,
          x: 500,
          y: 0,
          width: 500,
          height: 450,
          cleared: false,
          connected_rooms: [1],
          center: [750, 225],
        },
      ],
      spawn_pos: [200, 200],
    },
    level: 1,
  };
}
