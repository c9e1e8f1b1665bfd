export type {
  SessionId,
  SessionState,
  ChannelItem,
  TransportSink,
  RecordSnapshot,
  SessionInfo,
  SessionContext,
  SessionHandler,
  SessionHandlerFactory,
  Registry,
} from "./types.js";
export { SessionRecord } from "./record.js";
export { SessionRegistry } from "./registry.js";
export type { SessionRegistryOptions } from "./registry.js";
export { isTransitionAllowed, isTerminal } from "./lifecycle.js";
