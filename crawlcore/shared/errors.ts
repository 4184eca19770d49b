//crawlcore/shared/errors.ts

export type NetCoreErrorCode =
  | "bind_failed"
  | "connection_lost"
  | "codec_error"
  | "frame_too_large"
  | "capacity_exceeded"
  | "config_invalid";

export class NetCoreError extends Error {
  constructor(
    readonly code: NetCoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Host could not listen. Fatal; the caller decides what to do. */
export class BindError extends NetCoreError {
  constructor(
    readonly host: string,
    readonly port: number,
    cause?: unknown,
  ) {
    super("bind_failed", `Cannot listen on ${host}:${port}`, { cause });
  }
}

/** A transport failed or was closed under a pending operation. */
export class ConnectionError extends NetCoreError {
  constructor(message: string, cause?: unknown) {
    super("connection_lost", message, { cause });
  }
}

/** One message could not be encoded or decoded. */
export class CodecError extends NetCoreError {
  constructor(
    message: string,
    cause?: unknown,
    code: "codec_error" | "frame_too_large" = "codec_error",
  ) {
    super(code, message, { cause });
  }
}

/** Length prefix above the configured limit; the stream cannot be resynchronized. */
export class FrameTooLargeError extends CodecError {
  constructor(
    readonly length: number,
    readonly limit: number,
  ) {
    super(`Frame length ${length} exceeds limit ${limit}`, undefined, "frame_too_large");
  }
}

export class CapacityExceeded extends NetCoreError {
  constructor(
    readonly address: string,
    readonly maxPlayers: number,
  ) {
    super("capacity_exceeded", `Rejected ${address}: ${maxPlayers} players already connected`);
  }
}

export class ConfigError extends NetCoreError {
  constructor(message: string) {
    super("config_invalid", message);
  }
}
