//crawlcore/net/FramedTransport.ts

import net from "node:net";

import { CodecError, ConnectionError, FrameTooLargeError } from "../shared/errors";
import type { Message } from "../shared/messages";
import { decodeMessage, encodeMessageFrame, FrameDecoder } from "../protocol/MessageCodec";
import { Logger } from "../utils/logger";
import { DEFAULT_NET_CONFIG } from "../config/netConfig";
import { END_OF_STREAM, EndOfStream, MessageTransport, TransportOptions } from "./Transport";

const log = Logger.scope("TRANSPORT");

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  readTimeoutMs: DEFAULT_NET_CONFIG.readTimeoutMs,
  maxFrameBytes: DEFAULT_NET_CONFIG.maxFrameBytes,
  maxBufferedBytes: DEFAULT_NET_CONFIG.maxBufferedBytes,
  connectTimeoutMs: DEFAULT_NET_CONFIG.connectTimeoutMs,
};

interface PendingReceive {
  resolve(value: Message | EndOfStream): void;
  reject(err: ConnectionError): void;
  timer: NodeJS.Timeout | null;
}

export function describeSocket(socket: net.Socket): string {
  return `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`;
}

/**
 * Length-prefixed message transport over a TCP socket.
 *
 * Frames are `[uint32 BE length][body]`; bodies go through the schema codec.
 * A body that fails to decode is dropped and logged without closing the
 * connection. An oversized length prefix closes it, since the stream can no
 * longer be resynchronized.
 */
export class FramedTransport implements MessageTransport {
  readonly address: string;

  private readonly opts: TransportOptions;
  private readonly decoder: FrameDecoder;
  private readonly inbox: Message[] = [];
  private readonly waiters: PendingReceive[] = [];

  private ended = false;
  private closed = false;
  private failure: ConnectionError | null = null;

  /** Frames dropped because their body failed to decode. */
  droppedFrames = 0;
  /** Read-timeout intervals that elapsed while a receive was waiting. */
  idleTimeouts = 0;

  constructor(
    private readonly socket: net.Socket,
    opts: Partial<TransportOptions> = {},
  ) {
    this.opts = { ...DEFAULT_TRANSPORT_OPTIONS, ...opts };
    this.decoder = new FrameDecoder(this.opts.maxFrameBytes);
    this.address = describeSocket(socket);

    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("end", () => this.onEnd());
    socket.on("error", (err: Error) => this.onError(err));
    socket.on("close", () => this.onEnd());
  }

  /** Dial a host. Rejects with ConnectionError on refusal or timeout. */
  static connect(
    host: string,
    port: number,
    opts: Partial<TransportOptions> = {},
  ): Promise<FramedTransport> {
    const merged = { ...DEFAULT_TRANSPORT_OPTIONS, ...opts };

    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionError(`Timed out connecting to ${host}:${port}`));
      }, merged.connectTimeoutMs);

      socket.once("connect", () => {
        clearTimeout(timer);
        socket.removeAllListeners("error");
        resolve(new FramedTransport(socket, merged));
      });

      socket.once("error", (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(new ConnectionError(`Cannot connect to ${host}:${port}: ${err.message}`, err));
      });
    });
  }

  get isOpen(): boolean {
    return !this.closed && !this.ended && this.failure === null && !this.socket.destroyed;
  }

  send(message: Message): Promise<void> {
    let frame: Buffer;
    try {
      frame = encodeMessageFrame(message);
    } catch (err) {
      return Promise.reject(err);
    }
    return this.sendFrame(frame);
  }

  // The write is issued synchronously, so frames hit the socket in call order.
  sendFrame(frame: Buffer): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionError(`Transport to ${this.address} is closed`));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new ConnectionError(`Socket to ${this.address} is not writable`));
    }
    if (this.socket.writableLength > this.opts.maxBufferedBytes) {
      return Promise.reject(
        new ConnectionError(
          `Peer ${this.address} is not draining (${this.socket.writableLength} bytes queued)`,
        ),
      );
    }

    return new Promise((resolve, reject) => {
      this.socket.write(frame, (err?: Error | null) => {
        if (err) {
          reject(new ConnectionError(`Write to ${this.address} failed: ${err.message}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<Message | EndOfStream> {
    if (this.closed) {
      return Promise.reject(new ConnectionError(`Transport to ${this.address} is closed`));
    }

    const next = this.inbox.shift();
    if (next) return Promise.resolve(next);

    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(END_OF_STREAM);

    return new Promise((resolve, reject) => {
      const pending: PendingReceive = { resolve, reject, timer: null };
      this.armReadTimeout(pending);
      this.waiters.push(pending);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.settleWaiters((w) => w.reject(new ConnectionError(`Transport to ${this.address} is closed`)));
    this.socket.destroy();
  }

  // ---------------------------------------------------------------------------
  // Socket events
  // ---------------------------------------------------------------------------

  private armReadTimeout(pending: PendingReceive): void {
    pending.timer = setTimeout(() => {
      this.idleTimeouts++;
      log.debug("Read timeout elapsed; still waiting", {
        address: this.address,
        idleTimeouts: this.idleTimeouts,
      });
      this.armReadTimeout(pending);
    }, this.opts.readTimeoutMs);
    pending.timer.unref();
  }

  private onData(chunk: Buffer): void {
    if (this.closed || this.failure) return;

    let bodies: Buffer[];
    try {
      bodies = this.decoder.push(chunk);
    } catch (err) {
      if (err instanceof FrameTooLargeError) {
        log.warn("Oversized frame; dropping connection", {
          address: this.address,
          length: err.length,
          limit: err.limit,
        });
        this.fail(new ConnectionError(err.message, err));
        this.socket.destroy();
        return;
      }
      throw err;
    }

    for (const body of bodies) {
      let message: Message;
      try {
        message = decodeMessage(body);
      } catch (err) {
        if (!(err instanceof CodecError)) throw err;
        this.droppedFrames++;
        log.warn("Dropping undecodable frame", {
          address: this.address,
          bytes: body.length,
          reason: err.message,
        });
        continue;
      }
      this.deliver(message);
    }
  }

  private deliver(message: Message): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private onEnd(): void {
    if (this.ended) return;
    this.ended = true;

    if (this.decoder.pendingBytes > 0) {
      log.debug("Peer closed mid-frame; partial frame discarded", {
        address: this.address,
        pendingBytes: this.decoder.pendingBytes,
      });
    }

    if (this.closed || this.failure) return;
    this.settleWaiters((w) => w.resolve(END_OF_STREAM));
  }

  private onError(err: Error): void {
    this.fail(new ConnectionError(`Socket error on ${this.address}: ${err.message}`, err));
  }

  private fail(err: ConnectionError): void {
    if (this.failure || this.closed) return;
    this.failure = err;
    this.settleWaiters((w) => w.reject(err));
  }

  private settleWaiters(settle: (w: PendingReceive) => void): void {
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const w of pending) {
      if (w.timer) clearTimeout(w.timer);
      settle(w);
    }
  }
}
