export { Transport } from "./base.js";
export type { Disconnect, SendResult, TransportOptions } from "./base.js";
export {
  WebsocketTransport,
  channelFromSocket,
  parseInboundText,
  WS_ABNORMAL_CLOSURE,
  WS_NORMAL_CLOSURE,
} from "./websocket.js";
export type { WebsocketChannel } from "./websocket.js";
