//crawlcore/core/HostContext.ts

import type { NetworkConfig } from "../config/netConfig";
import type { BroadcastLoop } from "./BroadcastLoop";
import type { MessageRouter } from "./MessageRouter";
import type { SessionManager } from "./SessionManager";
import type { StateStore } from "./StateStore";

/** Everything a host worker needs, passed explicitly instead of module globals. */
export interface HostContext {
  readonly config: NetworkConfig;
  readonly store: StateStore;
  readonly sessions: SessionManager;
  readonly router: MessageRouter;
  readonly broadcaster: BroadcastLoop;
}
