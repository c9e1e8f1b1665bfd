import { closeCodeFor, type CloseCode, type CloseCodeName } from "./close-code.js";

/** One unit of the server-to-client protocol. */
export type Frame =
  | { type: "heartbeat" }
  | { type: "open" }
  | { type: "message"; payload: string }
  | { type: "batch"; payloads: string[] }
  | { type: "blob"; data: Uint8Array }
  | { type: "close"; code: CloseCode };

export function heartbeatFrame(): Frame {
  return { type: "heartbeat" };
}

export function openFrame(): Frame {
  return { type: "open" };
}

export function messageFrame(payload: string): Frame {
  return { type: "message", payload };
}

export function batchFrame(payloads: readonly string[]): Frame {
  return { type: "batch", payloads: [...payloads] };
}

export function closeFrame(name: CloseCodeName): Frame {
  return { type: "close", code: closeCodeFor(name) };
}

export function isCloseFrame(frame: Frame): frame is Extract<Frame, { type: "close" }> {
  return frame.type === "close";
}

export function encodeClose(code: CloseCode): string {
  return `c[${code.code},${JSON.stringify(code.reason)}]`;
}

/**
 * WebSocket text encoding of a frame. Blob frames have no text form and
 * yield undefined.
 */
export function encodeFrame(frame: Frame): string | undefined {
  switch (frame.type) {
    case "heartbeat":
      return "h";
    case "open":
      return "o";
    case "message":
      return `a${JSON.stringify([frame.payload])}`;
    case "batch":
      return `a${JSON.stringify(frame.payloads)}`;
    case "blob":
      return undefined;
    case "close":
      return encodeClose(frame.code);
  }
}

/** Copy a frame so buffers never share mutable payload arrays. */
export function cloneFrame(frame: Frame): Frame {
  switch (frame.type) {
    case "batch":
      return { type: "batch", payloads: [...frame.payloads] };
    case "blob":
      return { type: "blob", data: frame.data.slice() };
    case "close":
      return { type: "close", code: { ...frame.code } };
    default:
      return { ...frame };
  }
}
