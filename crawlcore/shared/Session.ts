//crawlcore/shared/Session.ts

import type { MessageTransport } from "../net/Transport";

export interface Session {
  /** Player id; assigned once, never reused while the registry lives. */
  id: number;
  transport: MessageTransport;
  address: string;
  connectedAt: number;
  lastSeen: number;
}
