import type { EngineEvent } from "@nearlink/contracts";
import { describe, expect, it } from "vitest";
import { DistanceEstimator } from "../src/distance-estimator.js";
import { UnknownPeerError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { comparePeers, PeerRegistry } from "../src/peer-registry.js";

function makeRegistry(): { registry: PeerRegistry; events: EngineEvent[] } {
  const events: EngineEvent[] = [];
  const registry = new PeerRegistry(new DistanceEstimator(), silentLogger(), (event) => events.push(event));
  return { registry, events };
}

describe("PeerRegistry", () => {
  it("creates a discovered peer with its first distance", () => {
    const { registry } = makeRegistry();
    const peer = registry.upsertDiscovered("p1", "Phone", -70, true, 1_000);

    expect(peer.connectionState).toBe("disconnected");
    expect(peer.pairingState).toBe("none");
    expect(peer.distance).toBe(10);
    expect(peer.distanceLevel).toBe("veryFar");
    expect(peer.volume).toBe(0.1);
    expect(peer.rssi).toBe(-70);
    expect(peer.lastSeen).toBe(1_000);
    expect(registry.size).toBe(1);
  });

  it("keeps a single record when a discovered peer connects", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("p1", "Phone", -60, true, 1_000);
    registry.markConnecting("p1", undefined, 1_100);
    registry.markConnected("p1", "Phone 2", 1_200);

    expect(registry.size).toBe(1);
    expect(registry.get("p1")?.connectionState).toBe("connected");
    expect(registry.get("p1")?.displayName).toBe("Phone 2");
    expect(registry.discoverable()).toEqual([]);
    expect(registry.active().map((peer) => peer.id)).toEqual(["p1"]);
  });

  it("removes non-paired peers on disconnect and resets paired ones", () => {
    const { registry, events } = makeRegistry();
    registry.markConnected("p1", "One", 1_000);
    registry.markConnected("p2", "Two", 1_000);
    registry.setPairingState("p2", "paired");
    registry.applyDistanceUpdate("p2", 2.5, "precise", 1_500);
    registry.setTokenExchange("p2", "completed");

    expect(registry.markDisconnected("p1")).toBe("removed");
    expect(registry.markDisconnected("p2")).toBe("retained");
    expect(registry.markDisconnected("nobody")).toBe("unknown");

    expect(registry.has("p1")).toBe(false);
    expect(events).toContainEqual({ type: "peer.removed", peerId: "p1" });
    expect(registry.get("p2")).toMatchObject({
      connectionState: "disconnected",
      pairingState: "paired",
      distance: 0,
      distanceLevel: "unknown",
      tokenExchange: "idle",
    });
  });

  it("drops invalid samples and samples for unknown peers", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("p1", "Phone", undefined, true, 1_000);

    expect(registry.applyDistanceUpdate("ghost", -60, "signalStrength", 1_100)).toBeUndefined();
    expect(registry.applyDistanceUpdate("p1", 3, "signalStrength", 1_100)?.distanceLevel).toBe("unknown");
    expect(registry.applyDistanceUpdate("p1", -1, "precise", 1_100)?.distanceLevel).toBe("unknown");
    expect(registry.applyDistanceUpdate("p1", Number.NaN, "precise", 1_100)?.distanceLevel).toBe("unknown");
  });

  it("never averages samples from different providers", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("p1", "Phone", -70, true, 1_000);
    registry.applyDistanceUpdate("p1", -70, "signalStrength", 1_100);

    const precise = registry.applyDistanceUpdate("p1", 0.5, "precise", 1_200);
    expect(precise?.providerType).toBe("precise");
    expect(precise?.distance).toBe(0.5);
    expect(precise?.distanceLevel).toBe("immediate");
    expect(precise?.volume).toBe(1);

    registry.revertToFallback("p1");
    expect(registry.applyDistanceUpdate("p1", -50, "signalStrength", 1_300)?.distance).toBe(1);
  });

  it("ignores discovery signal strength for a precisely ranged peer", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("p1", "Phone", undefined, true, 1_000);
    registry.applyDistanceUpdate("p1", 2, "precise", 1_100);

    const peer = registry.upsertDiscovered("p1", "Phone", -90, true, 1_200);
    expect(peer.distance).toBe(2);
    expect(peer.rssi).toBeUndefined();
  });

  it("purges stale peers but never active ones", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("stale", "Old", -60, true, 0);
    registry.upsertDiscovered("fresh", "New", -60, true, 20_000);
    registry.markConnected("linked", "Linked", 0);
    registry.rehydrate([{ id: "friend", name: "Friend", pairedAt: 0 }], 0);

    expect(registry.purgeStale(30_000, 31_000)).toEqual(["stale"]);
    expect(registry.has("fresh")).toBe(true);
    expect(registry.has("linked")).toBe(true);
    expect(registry.has("friend")).toBe(true);
  });

  it("keeps connected and paired peers when discovery loses them", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("a", "A", -60, true, 0);
    registry.markConnected("b", "B", 0);

    expect(registry.markLost("a")).toBe(true);
    expect(registry.markLost("b")).toBe(false);
    expect(registry.has("b")).toBe(true);
  });

  it("selects at most one peer and toggles the selection", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("a", "A", -60, true, 0);
    registry.upsertDiscovered("b", "B", -60, true, 0);

    expect(registry.select("a")).toBe("a");
    expect(registry.select("b")).toBe("b");
    expect(registry.list().filter((peer) => peer.selected).map((peer) => peer.id)).toEqual(["b"]);
    expect(registry.select("b")).toBeUndefined();
    expect(registry.list().some((peer) => peer.selected)).toBe(false);
    expect(() => registry.select("ghost")).toThrow(UnknownPeerError);
  });

  it("orders compatible peers first, then nearest first", () => {
    const { registry } = makeRegistry();
    registry.upsertDiscovered("far", "Far", -70, true, 0);
    registry.upsertDiscovered("near", "Near", -50, true, 0);
    registry.upsertDiscovered("other", "Other", -40, false, 0);
    registry.upsertDiscovered("silent", "Silent", undefined, true, 0);

    expect(registry.list().map((peer) => peer.id)).toEqual(["near", "far", "silent", "other"]);
    const [first, second] = registry.list();
    if (!first || !second) {
      throw new Error("expected at least two peers");
    }
    expect(comparePeers(first, second)).toBeLessThan(0);
    expect(comparePeers(second, first)).toBeGreaterThan(0);
  });

  it("applies device info to an existing peer", () => {
    const { registry } = makeRegistry();
    registry.markConnected("p1", undefined, 0);
    expect(registry.get("p1")?.displayName).toBe("p1");

    registry.applyDeviceInfo("p1", "Kitchen", true, 10);
    expect(registry.get("p1")).toMatchObject({ displayName: "Kitchen", isCompatiblePeer: true, lastSeen: 10 });
    expect(registry.applyDeviceInfo("ghost", "X", true, 10)).toBeUndefined();
  });

  it("clears ranging output and reported volume when a paired peer disconnects", () => {
    const { registry } = makeRegistry();
    registry.markConnected("p2", "Two", 1_000);
    registry.setPairingState("p2", "paired");
    registry.applyDistanceUpdate("p2", -60, "signalStrength", 1_100);
    registry.applyDistanceUpdate("p2", 2.5, "precise", 1_200);
    registry.applyVolumeSync("p2", 0.8, 2.4, 1_300);
    expect(registry.get("p2")).toMatchObject({ providerType: "precise", rssi: -60, remoteVolume: 0.8 });
    expect(registry.get("p2")?.volume).not.toBe(0.5);

    registry.markDisconnected("p2");

    const peer = registry.get("p2");
    expect(peer).toMatchObject({ providerType: "signalStrength", volume: 0.5, distance: 0, distanceLevel: "unknown" });
    expect(peer?.rssi).toBeUndefined();
    expect(peer?.remoteVolume).toBeUndefined();
    expect(peer?.remoteDistance).toBeUndefined();
  });

  it("records the volume a connected peer reports", () => {
    const { registry, events } = makeRegistry();
    registry.upsertDiscovered("p1", "One", undefined, true, 0);
    expect(registry.applyVolumeSync("p1", 0.3, 4, 10)).toBeUndefined();

    registry.markConnected("p1", undefined, 20);
    events.length = 0;
    registry.applyVolumeSync("p1", 0.3, 4, 30);
    expect(registry.get("p1")).toMatchObject({ remoteVolume: 0.3, remoteDistance: 4, lastSeen: 30 });
    expect(events.map((event) => event.type)).toEqual(["peer.updated"]);
  });
});
