import { describe, expect, it } from "vitest";
import { createMessage, decodeMessage, encodeMessage, fromBase64, toBase64 } from "../src/codec.js";
import { MessageDecodeError } from "../src/errors.js";

function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

describe("peer message codec", () => {
  it("stamps messages in seconds", () => {
    const message = createMessage("pairing-request", { deviceName: "Alpha" }, 1_700_000_000_500);
    expect(message).toEqual({
      type: "pairing-request",
      timestamp: 1_700_000_000.5,
      payload: { deviceName: "Alpha" },
    });
  });

  it("decodes what it encodes", () => {
    const message = createMessage("discovery-token", { token: "dG9rZW4tYQ==", sender: "Alpha" }, 2_000);
    expect(decodeMessage(encodeMessage(message))).toEqual({ kind: "message", message });
  });

  it("maps unknown tags to the ignored variant", () => {
    const decoded = decodeMessage(bytes(JSON.stringify({ type: "telemetry", timestamp: 1, payload: {} })));
    expect(decoded).toEqual({ kind: "ignored", type: "telemetry" });
  });

  it("defaults a missing payload to an empty map", () => {
    const decoded = decodeMessage(bytes(JSON.stringify({ type: "heartbeat", timestamp: 3 })));
    expect(decoded).toEqual({ kind: "message", message: { type: "heartbeat", timestamp: 3, payload: {} } });
  });

  it("rejects malformed frames", () => {
    expect(() => decodeMessage(bytes("{not json"))).toThrow(MessageDecodeError);
    expect(() => decodeMessage(bytes(JSON.stringify({ type: "heartbeat" })))).toThrow(MessageDecodeError);
    expect(() => decodeMessage(bytes(JSON.stringify({ type: "heartbeat", timestamp: 1, payload: { n: 4 } }))))
      .toThrow(MessageDecodeError);
  });

  it("converts base64", () => {
    expect(toBase64(bytes("token-a"))).toBe("dG9rZW4tYQ==");
    expect(new TextDecoder().decode(fromBase64("dG9rZW4tYQ=="))).toBe("token-a");
  });
});
