//crawlcore/protocol/MessageCodec.ts

import { CodecError, FrameTooLargeError } from "../shared/errors";
import { createMessage, Message, MessageType } from "../shared/messages";
import {
  describeIssues,
  envelopeSchema,
  isMessageType,
  PAYLOAD_SCHEMAS,
  SCHEMA_VERSION,
} from "./MessageSchemas";

/** Width of the big-endian length prefix in front of every frame body. */
export const FRAME_HEADER_BYTES = 4;

/** Largest value the 4-byte prefix can carry. */
export const MAX_FRAME_LENGTH = 0xffff_ffff;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Encode one message body: UTF-8 JSON of `{ v, type, payload, timestamp }`.
 *
 * The payload is validated against the schema table first, so nothing the
 * peer would reject (NaN, a missing field, an unknown tag) leaves this process.
 */
export function encodeMessage(message: Message): Buffer {
  if (!isMessageType(message.type)) {
    throw new CodecError(`Unknown message type "${String(message.type)}"`);
  }

  const parsed = PAYLOAD_SCHEMAS[message.type].safeParse(message.payload);
  if (!parsed.success) {
    throw new CodecError(
      `Payload for "${message.type}" does not match schema: ${describeIssues(parsed.error)}`,
      parsed.error,
    );
  }

  if (!Number.isFinite(message.timestamp)) {
    throw new CodecError(`Timestamp for "${message.type}" is not a finite number`);
  }

  return Buffer.from(
    JSON.stringify({
      v: SCHEMA_VERSION,
      type: message.type,
      payload: parsed.data,
      timestamp: message.timestamp,
    }),
    "utf8",
  );
}

function parsePayload<T extends MessageType>(
  type: T,
  payload: unknown,
  timestamp: number,
): Message<T> {
  const parsed = PAYLOAD_SCHEMAS[type].safeParse(payload);
  if (!parsed.success) {
    throw new CodecError(
      `Payload for "${type}" does not match schema: ${describeIssues(parsed.error)}`,
      parsed.error,
    );
  }
  return createMessage(type, parsed.data, timestamp);
}

/** Decode one message body. Throws CodecError; never returns a partial message. */
export function decodeMessage(bytes: Uint8Array): Message {
  let raw: unknown;
  try {
    raw = JSON.parse(utf8.decode(bytes));
  } catch (err) {
    throw new CodecError("Message body is not valid UTF-8 JSON", err);
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new CodecError(`Bad message envelope: ${describeIssues(envelope.error)}`, envelope.error);
  }

  const { type, payload, timestamp } = envelope.data;
  if (!isMessageType(type)) {
    throw new CodecError(`Unknown message type "${type}"`);
  }

  return parsePayload(type, payload, timestamp);
}

/** Prefix a body with its 4-byte big-endian length. */
export function encodeFrame(body: Uint8Array): Buffer {
  if (body.length > MAX_FRAME_LENGTH) {
    throw new FrameTooLargeError(body.length, MAX_FRAME_LENGTH);
  }
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + body.length);
  frame.writeUInt32BE(body.length, 0);
  frame.set(body, FRAME_HEADER_BYTES);
  return frame;
}

export function encodeMessageFrame(message: Message): Buffer {
  return encodeFrame(encodeMessage(message));
}

/**
 * Reassembles frame bodies from arbitrary stream chunks.
 *
 * Bytes are held until a complete `[length][body]` is buffered; a short read
 * never surfaces as a body.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = MAX_FRAME_LENGTH) {}

  /** Bytes received but not yet part of a returned body. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /**
   * Append a chunk and return every body it completes, in stream order.
   * Throws FrameTooLargeError when a prefix exceeds the limit; the decoder is
   * unusable afterwards because the stream position is lost.
   */
  push(chunk: Uint8Array): Buffer[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);

    const bodies: Buffer[] = [];
    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const length = this.buffer.readUInt32BE(0);
      if (length > this.maxFrameBytes) {
        throw new FrameTooLargeError(length, this.maxFrameBytes);
      }

      const end = FRAME_HEADER_BYTES + length;
      if (this.buffer.length < end) break;

      bodies.push(Buffer.from(this.buffer.subarray(FRAME_HEADER_BYTES, end)));
      this.buffer = this.buffer.subarray(end);
    }
    return bodies;
  }
}
