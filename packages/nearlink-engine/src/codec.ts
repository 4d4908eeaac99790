import {
  PeerMessageTypeSchema,
  ProtocolFrameSchema,
  type PeerMessageType,
} from "@nearlink/contracts";
import { MessageDecodeError } from "./errors.js";

export interface PeerMessage {
  type: PeerMessageType;
  /** Seconds since the epoch. */
  timestamp: number;
  payload: Record<string, string>;
}

export type DecodedMessage =
  | { kind: "message"; message: PeerMessage }
  | { kind: "ignored"; type: string };

export function createMessage(
  type: PeerMessageType,
  payload: Record<string, string> = {},
  nowMs = Date.now(),
): PeerMessage {
  return { type, timestamp: nowMs / 1000, payload };
}

export function encodeMessage(message: PeerMessage): Uint8Array {
  return Buffer.from(JSON.stringify(message), "utf8");
}

/**
 * Throws MessageDecodeError for frames that are not a protocol message at all.
 * A well-formed frame with an unrecognised tag is returned as `ignored`.
 */
export function decodeMessage(bytes: Uint8Array): DecodedMessage {
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch {
    throw new MessageDecodeError("payload is not valid JSON");
  }

  const frame = ProtocolFrameSchema.safeParse(parsedJson);
  if (!frame.success) {
    throw new MessageDecodeError(frame.error.issues.map((issue) => issue.message).join(", "));
  }

  const type = PeerMessageTypeSchema.safeParse(frame.data.type);
  if (!type.success) {
    return { kind: "ignored", type: frame.data.type };
  }

  return {
    kind: "message",
    message: { type: type.data, timestamp: frame.data.timestamp, payload: frame.data.payload },
  };
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

export function fromBase64(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, "base64"));
}
