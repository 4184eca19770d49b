// crawlcore/index.ts

// Config
export * from "./config/netConfig";
export * from "./config/logconfig";
export { loadDotEnv } from "./config/env";

// Shared model
export * from "./shared/GameState";
export * from "./shared/messages";
export * from "./shared/errors";
export type { Session } from "./shared/Session";

// Wire protocol
export * from "./protocol/MessageCodec";
export { SCHEMA_VERSION, PAYLOAD_SCHEMAS, gameStateSchema } from "./protocol/MessageSchemas";

// Transport
export * from "./net/Transport";
export { FramedTransport } from "./net/FramedTransport";

// Host
export { HostServer } from "./core/HostServer";
export type { HostServerOptions } from "./core/HostServer";
export type { HostContext } from "./core/HostContext";
export { StateStore } from "./core/StateStore";
export type { DroppedIds, EnemyDamageOutcome } from "./core/StateStore";
export { SessionManager } from "./core/SessionManager";
export { MessageRouter } from "./core/MessageRouter";
export { BroadcastLoop } from "./core/BroadcastLoop";

// Client
export { ClientMirror } from "./client/ClientMirror";
export type { MirrorEvents, DisconnectedEvent } from "./client/ClientMirror";
export { TypedEventBus } from "./client/EventBus";

// Logging
export { Logger } from "./utils/logger";
