import { afterEach, describe, expect, it, vi } from "vitest";
import type { BridgeOutbound } from "@nearlink/contracts";
import {
  fromBase64,
  InMemoryPairedDeviceStore,
  ProximityEngine,
  RangingUnavailableError,
  silentLogger,
  type RangingListener,
  type TransportListener,
} from "@nearlink/engine";
import { BridgeUnavailableError, HostBridge } from "../src/bridge.js";

function recordingTransportListener() {
  const calls: string[] = [];
  const listener: TransportListener = {
    peerFound: (peer) => calls.push(`found:${peer.peerId}:${peer.rssi ?? "none"}`),
    peerLost: (peerId) => calls.push(`lost:${peerId}`),
    connectionState: (peerId, state) => calls.push(`connection:${peerId}:${state}`),
    data: (peerId, bytes) => calls.push(`data:${peerId}:${Buffer.from(bytes).toString("utf8")}`),
  };
  return { calls, listener };
}

function recordingRangingListener() {
  const calls: string[] = [];
  const listener: RangingListener = {
    sample: (peerId, value) => calls.push(`sample:${peerId}:${value}`),
    localToken: (token) => calls.push(`token:${token}`),
    invalidated: (peerId, reason) => calls.push(`invalidated:${peerId ?? "session"}:${reason}`),
  };
  return { calls, listener };
}

function attachedHub() {
  const hub = new HostBridge(silentLogger(), 1000);
  const frames: BridgeOutbound[] = [];
  const outbound = (frame: BridgeOutbound) => {
    frames.push(frame);
  };
  hub.attach(outbound);
  hub.handleFrame({ type: "bridge.hello", precise: true, signalStrength: true });
  return { hub, frames, outbound };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("HostBridge", () => {
  it("reports sources unavailable until a host says hello", () => {
    const hub = new HostBridge(silentLogger());
    expect(hub.precise.isAvailable()).toBe(false);

    hub.attach(() => undefined);
    expect(hub.attached).toBe(true);
    expect(hub.signalStrength.isAvailable()).toBe(false);

    hub.handleFrame({ type: "bridge.hello", precise: false, signalStrength: true });
    expect(hub.precise.isAvailable()).toBe(false);
    expect(hub.signalStrength.isAvailable()).toBe(true);
  });

  it("refuses a second host", () => {
    const { hub } = attachedHub();
    expect(hub.attach(() => undefined)).toBe(false);
  });

  it("throws when posting without a host", () => {
    const hub = new HostBridge(silentLogger());
    expect(() => hub.transport.send("peer-a", new Uint8Array([1]))).toThrow(BridgeUnavailableError);
  });

  it("routes transport frames to the discovery listener", () => {
    const { hub, frames } = attachedHub();
    const { calls, listener } = recordingTransportListener();
    hub.transport.startDiscovery(listener);

    hub.handleFrame({ type: "peer.found", peerId: "a", displayName: "A", rssi: -60 });
    hub.handleFrame({ type: "peer.connection", peerId: "a", state: "connected" });
    hub.handleFrame({ type: "peer.data", peerId: "a", data: Buffer.from("hello").toString("base64") });
    hub.handleFrame({ type: "peer.lost", peerId: "a" });

    expect(calls).toEqual(["found:a:-60", "connection:a:connected", "data:a:hello", "lost:a"]);
    expect(frames).toEqual([{ type: "transport.discovery", enabled: true }]);

    hub.transport.stopDiscovery();
    hub.handleFrame({ type: "peer.lost", peerId: "b" });
    expect(calls).toHaveLength(4);
  });

  it("encodes outbound bytes as base64", () => {
    const { hub, frames } = attachedHub();
    hub.transport.send("a", new Uint8Array([104, 105]));
    hub.transport.broadcast(new Uint8Array([104, 105]));

    expect(frames).toEqual([
      { type: "transport.send", peerId: "a", data: "aGk=" },
      { type: "transport.send", data: "aGk=" },
    ]);
    expect(Buffer.from(fromBase64("aGk=")).toString("utf8")).toBe("hi");
  });

  it("resolves a ranging start when the host confirms it", async () => {
    const { hub, frames } = attachedHub();
    const { calls, listener } = recordingRangingListener();

    const started = hub.precise.start(listener);
    expect(frames).toEqual([{ type: "ranging.start", kind: "precise" }]);
    hub.handleFrame({ type: "ranging.started", kind: "precise" });
    await started;

    hub.handleFrame({ type: "ranging.token", token: "dG9rZW4=" });
    hub.handleFrame({ type: "ranging.sample", source: "precise", peerId: "a", value: 1.5 });
    hub.handleFrame({ type: "ranging.invalidated", reason: "interrupted" });

    expect(calls).toEqual(["token:dG9rZW4=", "sample:a:1.5", "invalidated:session:interrupted"]);
  });

  it("rejects a ranging start the host refuses", async () => {
    const { hub } = attachedHub();
    const started = hub.signalStrength.start(recordingRangingListener().listener);
    hub.handleFrame({ type: "ranging.failed", kind: "signalStrength", reason: "radio off" });

    await expect(started).rejects.toThrow("Ranging source signalStrength unavailable: radio off");
  });

  it("rejects a ranging start the host never answers", async () => {
    vi.useFakeTimers();
    const { hub } = attachedHub();
    const started = hub.precise.start(recordingRangingListener().listener);
    const outcome = expect(started).rejects.toBeInstanceOf(RangingUnavailableError);

    vi.advanceTimersByTime(1000);
    await outcome;
  });

  it("invalidates running sources when the host detaches", async () => {
    const { hub, outbound } = attachedHub();
    const { calls, listener } = recordingRangingListener();
    const started = hub.signalStrength.start(listener);
    hub.handleFrame({ type: "ranging.started", kind: "signalStrength" });
    await started;

    const pending = hub.precise.start(recordingRangingListener().listener);
    hub.detach(outbound);

    await expect(pending).rejects.toThrow("host bridge detached");
    expect(calls).toEqual(["invalidated:session:host bridge detached"]);
    expect(hub.attached).toBe(false);
    expect(hub.signalStrength.isAvailable()).toBe(false);
  });

  it("disconnects reported links before ending the ranging sessions on detach", () => {
    const { hub, outbound } = attachedHub();
    const { calls, listener } = recordingTransportListener();
    hub.transport.startDiscovery(listener);
    hub.handleFrame({ type: "peer.connection", peerId: "a", state: "connected" });
    hub.handleFrame({ type: "peer.connection", peerId: "b", state: "connected" });
    hub.handleFrame({ type: "peer.connection", peerId: "b", state: "disconnected" });
    calls.length = 0;

    hub.detach(outbound);
    expect(calls).toEqual(["connection:a:disconnected"]);
  });

  it("lets the engine fail and restart cleanly across a host reconnect", async () => {
    const hub = new HostBridge(silentLogger(), 1000);
    const frames: BridgeOutbound[] = [];
    const outbound = (frame: BridgeOutbound): void => {
      frames.push(frame);
      if (frame.type === "ranging.start") {
        hub.handleFrame({ type: "ranging.started", kind: frame.kind });
      }
    };
    const engine = new ProximityEngine(
      {
        transport: hub.transport,
        ranging: { precise: hub.precise, signalStrength: hub.signalStrength },
        store: new InMemoryPairedDeviceStore(),
      },
      { localName: "Alpha" },
    );
    hub.attach(outbound);
    hub.handleFrame({ type: "bridge.hello", precise: false, signalStrength: true });
    await engine.start();

    hub.handleFrame({ type: "peer.found", peerId: "b", displayName: "Bravo", rssi: -60 });
    hub.handleFrame({ type: "peer.connection", peerId: "b", state: "connected" });
    await engine.idle();
    expect(engine.appState).toBe("connected");

    hub.detach(outbound);
    await engine.idle();
    expect(engine.snapshot()).toMatchObject({
      state: "error",
      errorMessage: "Ranging stopped: host bridge detached",
      active: [],
      discoverable: [],
    });
    expect(engine.snapshot().activeProvider).toBeUndefined();

    hub.attach(outbound);
    hub.handleFrame({ type: "bridge.hello", precise: false, signalStrength: true });
    await engine.start();
    expect(engine.snapshot()).toMatchObject({ state: "discovering", activeProvider: "signalStrength" });
    expect(frames.filter((frame) => frame.type === "ranging.start")).toHaveLength(2);

    await engine.stop();
  });

  it("ignores a detach from a socket that is not attached", () => {
    const { hub } = attachedHub();
    hub.detach(() => undefined);
    expect(hub.attached).toBe(true);
  });
});
