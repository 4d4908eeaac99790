import { describe, expect, it } from "vitest";
import {
  BridgeInboundSchema,
  DiscoveryTokenPayloadSchema,
  PairedDeviceListSchema,
  ProtocolFrameSchema,
  SessionRequestSchema,
  VolumeSyncPayloadSchema,
} from "../src/index.js";

describe("contracts", () => {
  it("keeps unknown message tags as plain strings", () => {
    const parsed = ProtocolFrameSchema.parse({ type: "telemetry", timestamp: 12.5 });
    expect(parsed).toEqual({ type: "telemetry", timestamp: 12.5, payload: {} });
  });

  it("requires base64 ranging tokens", () => {
    expect(DiscoveryTokenPayloadSchema.safeParse({ token: "dG9rZW4tYQ==" }).success).toBe(true);
    expect(DiscoveryTokenPayloadSchema.safeParse({ token: "dG9rZW4tYQ" }).success).toBe(false);
    expect(DiscoveryTokenPayloadSchema.safeParse({ token: "" }).success).toBe(false);
  });

  it("validates the persisted paired device list", () => {
    expect(PairedDeviceListSchema.safeParse([{ id: "b", name: "Bravo", pairedAt: 1 }]).success).toBe(true);
    expect(PairedDeviceListSchema.safeParse([{ id: "b", name: "Bravo", pairedAt: -1 }]).success).toBe(false);
  });

  it("discriminates host bridge frames", () => {
    const frame = BridgeInboundSchema.parse({ type: "ranging.sample", source: "precise", peerId: "p1", value: 1.25 });
    expect(frame.type === "ranging.sample" && frame.value).toBe(1.25);
    expect(BridgeInboundSchema.safeParse({ type: "peer.data", peerId: "p1", data: "%%" }).success).toBe(false);
  });

  it("defaults the session role to ui", () => {
    expect(SessionRequestSchema.parse({ clientId: "panel" })).toEqual({ clientId: "panel", role: "ui" });
  });

  it("reads volume sync values sent as decimal strings", () => {
    expect(VolumeSyncPayloadSchema.parse({ volume: "0.25", distance: "3.5" })).toEqual({ volume: 0.25, distance: 3.5 });
    expect(VolumeSyncPayloadSchema.safeParse({ volume: "1.5", distance: "3" }).success).toBe(false);
    expect(VolumeSyncPayloadSchema.safeParse({ volume: "0.5", distance: "-1" }).success).toBe(false);
    expect(VolumeSyncPayloadSchema.safeParse({ volume: "loud", distance: "3" }).success).toBe(false);
    expect(VolumeSyncPayloadSchema.safeParse({ volume: "", distance: "3" }).success).toBe(false);
  });
});
