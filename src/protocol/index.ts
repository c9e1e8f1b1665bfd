export type { Frame } from "./frame.js";
export {
  heartbeatFrame,
  openFrame,
  messageFrame,
  batchFrame,
  closeFrame,
  isCloseFrame,
  encodeFrame,
  encodeClose,
  cloneFrame,
} from "./frame.js";
export type { CloseCode, CloseCodeName } from "./close-code.js";
export { CLOSE_CODES, closeCodeFor } from "./close-code.js";
