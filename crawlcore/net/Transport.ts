//crawlcore/net/Transport.ts

import type { Message } from "../shared/messages";

export const END_OF_STREAM: unique symbol = Symbol("END_OF_STREAM");
export type EndOfStream = typeof END_OF_STREAM;

/**
 * One reliable, ordered, framed connection to a peer.
 *
 * SessionManager and ClientMirror only see this interface, so tests can run
 * them against in-process transports.
 */
export interface MessageTransport {
  /** "ip:port" of the peer, for logs. */
  readonly address: string;
  readonly isOpen: boolean;

  /** Write one complete frame; rejects with ConnectionError. */
  send(message: Message): Promise<void>;
  /** Write a frame that is already encoded (broadcasts encode once). */
  sendFrame(frame: Buffer): Promise<void>;

  /**
   * Resolve with the next message, or END_OF_STREAM once the peer closed and
   * every buffered message was read. Rejects with ConnectionError when the
   * transport fails or is closed locally.
   */
  receive(): Promise<Message | EndOfStream>;

  /** Idempotent. Pending and later operations fail. */
  close(): void;
}

export interface TransportOptions {
  /** How long a receive waits before re-checking state; it keeps waiting afterwards. */
  readTimeoutMs: number;
  maxFrameBytes: number;
  /** Unsent bytes allowed to queue before a send is treated as a failure. */
  maxBufferedBytes: number;
  connectTimeoutMs: number;
}
