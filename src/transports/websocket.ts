import { type } from "arktype";
import { WebSocket } from "ws";
import { closeCodeFor, encodeFrame, type Frame } from "../protocol/index.js";
import { MalformedPayloadError, errorMessage } from "../shared/errors.js";
import { Transport, type TransportOptions } from "./base.js";

/** WebSocket close code for a connection that ended without a close frame. */
export const WS_ABNORMAL_CLOSURE = 1006;
export const WS_NORMAL_CLOSURE = 1000;

const PayloadList = type("string[]");
const PayloadOrList = type("string | string[]");

/** The part of a WebSocket the transport writes to. */
export interface WebsocketChannel {
  send(data: string): void;
  close(code: number, reason: string): void;
  isOpen(): boolean;
}

export function channelFromSocket(ws: WebSocket): WebsocketChannel {
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new MalformedPayloadError(`Invalid JSON: ${errorMessage(err)}`, text);
  }
}

/**
 * Decode client text into message payloads.
 *
 * `["a","b"]` is the usual form: a JSON array of strings. Text that does not
 * start with `[` is read as one JSON value, either a string or an array of
 * strings. Empty text and `[]` carry nothing.
 */
export function parseInboundText(text: string): string[] {
  if (text.length === 0) return [];
  if (text.startsWith("[")) {
    if (text.length <= 2) return [];
    const list = PayloadList(parseJson(text));
    if (list instanceof type.errors) {
      throw new MalformedPayloadError(`Expected an array of strings: ${list.summary}`, text);
    }
    return list;
  }
  const value = PayloadOrList(parseJson(text));
  if (value instanceof type.errors) {
    throw new MalformedPayloadError(`Expected a string or an array of strings: ${value.summary}`, text);
  }
  return typeof value === "string" ? [value] : value;
}

/** Transport over a WebSocket, using the text framing of the protocol. */
export class WebsocketTransport extends Transport {
  constructor(
    private readonly channel: WebsocketChannel,
    options: TransportOptions,
  ) {
    super(options);
  }

  isConnected(): boolean {
    return this.channel.isOpen();
  }

  /** Text message from the client. */
  onText(text: string): void {
    if (text.length === 0) return;
    this.whenAttached(() => {
      let payloads: string[];
      try {
        payloads = parseInboundText(text);
      } catch (err) {
        this.rejectPayload(
          err instanceof MalformedPayloadError ? err : new MalformedPayloadError(errorMessage(err), text),
        );
        return;
      }
      for (const payload of payloads) {
        this.registry.deliver(this.sid, payload);
      }
    });
  }

  /** Binary message from the client; not part of the protocol. */
  onBinary(size: number): void {
    this.log.error({ size }, "Binary messages are not supported");
  }

  /** The socket closed. Without a close frame (1006) the drop is abrupt. */
  onPeerClose(code: number): void {
    this.log.debug({ code }, "websocket closed");
    this.release(code === WS_ABNORMAL_CLOSURE ? "abrupt" : "graceful");
  }

  /** Framing or socket error reported by the WebSocket layer. */
  onProtocolError(err: Error): void {
    this.log.warn({ err: err.message }, "websocket protocol error");
    this.release("abrupt");
  }

  protected encode(frame: Frame): string | undefined {
    return encodeFrame(frame);
  }

  protected write(data: string): boolean {
    if (!this.channel.isOpen()) return false;
    try {
      this.channel.send(data);
      return true;
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "websocket write failed");
      return false;
    }
  }

  protected disconnect(): void {
    if (this.channel.isOpen()) this.channel.close(WS_NORMAL_CLOSURE, "Normal closure");
  }

  private rejectPayload(err: MalformedPayloadError): void {
    const code = closeCodeFor("InvalidPayload");
    this.log.warn({ err: err.message }, "malformed client payload");
    this.writeClose(code);
    if (this.channel.isOpen()) this.channel.close(code.code, code.reason);
    this.release("abrupt");
  }
}
