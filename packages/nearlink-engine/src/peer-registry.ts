import type {
  EngineEvent,
  PairedDevice,
  PairingState,
  PeerSnapshot,
  ProviderType,
  TokenExchangeState,
} from "@nearlink/contracts";
import type { DistanceEstimator } from "./distance-estimator.js";
import { UnknownPeerError } from "./errors.js";
import type { EngineLogger } from "./logger.js";

export type Peer = PeerSnapshot;

export type DisconnectOutcome = "removed" | "retained" | "unknown";

const UNRANGED_VOLUME = 0.5;

/** Compatible peers first, then nearest first; unranged peers sink to the end. */
export function comparePeers(a: Peer, b: Peer): number {
  if (a.isCompatiblePeer !== b.isCompatiblePeer) {
    return a.isCompatiblePeer ? -1 : 1;
  }
  const aRanged = a.distanceLevel !== "unknown";
  const bRanged = b.distanceLevel !== "unknown";
  if (aRanged !== bRanged) {
    return aRanged ? -1 : 1;
  }
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  return a.id.localeCompare(b.id);
}

function isActive(peer: Peer): boolean {
  return peer.connectionState === "connected" || peer.pairingState === "paired";
}

/**
 * Sole owner of peer records. Discovered and connected peers live in the same
 * map; the category a peer shows up in is derived from its states.
 */
export class PeerRegistry {
  private readonly peers = new Map<string, Peer>();

  constructor(
    private readonly estimator: DistanceEstimator,
    private readonly logger: EngineLogger,
    private readonly emit: (event: EngineEvent) => void = () => undefined,
  ) {}

  get(peerId: string): Peer | undefined {
    const peer = this.peers.get(peerId);
    return peer ? { ...peer } : undefined;
  }

  has(peerId: string): boolean {
    return this.peers.has(peerId);
  }

  get size(): number {
    return this.peers.size;
  }

  list(): Peer[] {
    return Array.from(this.peers.values(), (peer) => ({ ...peer })).sort(comparePeers);
  }

  discoverable(): Peer[] {
    return this.list().filter((peer) => !isActive(peer));
  }

  active(): Peer[] {
    return this.list().filter(isActive);
  }

  connectedIds(): string[] {
    return Array.from(this.peers.values())
      .filter((peer) => peer.connectionState === "connected")
      .map((peer) => peer.id);
  }

  hasConnectedPairedPeer(): boolean {
    return Array.from(this.peers.values()).some(
      (peer) => peer.connectionState === "connected" && peer.pairingState === "paired",
    );
  }

  rehydrate(devices: PairedDevice[], nowMs = Date.now()): void {
    for (const device of devices) {
      const existing = this.peers.get(device.id);
      if (existing) {
        existing.pairingState = "paired";
        this.changed(existing);
        continue;
      }
      this.changed(this.create(device.id, device.name, nowMs, {
        pairingState: "paired",
        lastSeen: device.lastConnected ?? device.pairedAt,
      }));
    }
  }

  upsertDiscovered(
    peerId: string,
    displayName: string,
    signalStrength?: number,
    compatible?: boolean,
    nowMs = Date.now(),
  ): Peer {
    const peer = this.peers.get(peerId) ?? this.create(peerId, displayName, nowMs);
    peer.displayName = displayName;
    peer.lastSeen = nowMs;
    if (compatible !== undefined) {
      peer.isCompatiblePeer = compatible;
    }

    if (signalStrength !== undefined && peer.providerType === "signalStrength") {
      return this.applyDistanceUpdate(peerId, signalStrength, "signalStrength", nowMs) ?? { ...peer };
    }
    this.changed(peer);
    return { ...peer };
  }

  markConnecting(peerId: string, displayName?: string, nowMs = Date.now()): Peer {
    return this.setConnection(peerId, "connecting", displayName, nowMs);
  }

  markConnected(peerId: string, displayName?: string, nowMs = Date.now()): Peer {
    return this.setConnection(peerId, "connected", displayName, nowMs);
  }

  /**
   * Non-paired peers leave the registry. Paired peers stay visible with their
   * runtime fields reset.
   */
  markDisconnected(peerId: string): DisconnectOutcome {
    const peer = this.peers.get(peerId);
    if (!peer) {
      return "unknown";
    }
    if (peer.pairingState !== "paired") {
      this.remove(peerId);
      return "removed";
    }
    this.estimator.removePeer(peerId);
    peer.connectionState = "disconnected";
    peer.providerType = "signalStrength";
    peer.distance = 0;
    peer.distanceLevel = "unknown";
    peer.volume = UNRANGED_VOLUME;
    peer.tokenExchange = "idle";
    delete peer.rssi;
    delete peer.remoteVolume;
    delete peer.remoteDistance;
    this.changed(peer);
    return "retained";
  }

  /** Discovery lost sight of the peer; connected and paired peers are kept. */
  markLost(peerId: string): boolean {
    const peer = this.peers.get(peerId);
    if (!peer || isActive(peer)) {
      return false;
    }
    this.remove(peerId);
    return true;
  }

  applyDistanceUpdate(
    peerId: string,
    rawMeasurement: number,
    sourceType: ProviderType,
    nowMs = Date.now(),
  ): Peer | undefined {
    const peer = this.peers.get(peerId);
    if (!peer) {
      this.logger.debug({ peerId, sourceType }, "distance sample for unknown peer dropped");
      return undefined;
    }

    const distance = sourceType === "signalStrength"
      ? this.estimator.rssiToDistance(rawMeasurement)
      : rawMeasurement;
    if (!Number.isFinite(rawMeasurement) || (sourceType === "signalStrength" && rawMeasurement >= 0) || distance < 0) {
      this.logger.debug({ peerId, sourceType, rawMeasurement }, "invalid distance sample dropped");
      return { ...peer };
    }

    if (peer.providerType !== sourceType) {
      this.estimator.resetPeer(peerId);
      peer.providerType = sourceType;
    }

    const smoothed = this.estimator.addSample(peerId, distance);
    peer.distance = smoothed;
    peer.distanceLevel = this.estimator.distanceLevel(smoothed);
    peer.volume = this.estimator.volumeForDistance(smoothed);
    peer.lastSeen = nowMs;
    if (sourceType === "signalStrength") {
      peer.rssi = Math.round(rawMeasurement);
    }
    this.changed(peer);
    return { ...peer };
  }

  /** Moves a peer back to signal-strength ranging, e.g. after a precise session ends. */
  revertToFallback(peerId: string): void {
    const peer = this.peers.get(peerId);
    if (!peer || peer.providerType === "signalStrength") {
      return;
    }
    this.estimator.resetPeer(peerId);
    peer.providerType = "signalStrength";
    this.changed(peer);
  }

  /** Liveness only; no update event is emitted. */
  touch(peerId: string, nowMs = Date.now()): void {
    const peer = this.peers.get(peerId);
    if (peer) {
      peer.lastSeen = nowMs;
    }
  }

  applyDeviceInfo(peerId: string, displayName: string, compatible: boolean, nowMs = Date.now()): Peer | undefined {
    const peer = this.peers.get(peerId);
    if (!peer) {
      return undefined;
    }
    peer.displayName = displayName;
    peer.isCompatiblePeer = compatible;
    peer.lastSeen = nowMs;
    this.changed(peer);
    return { ...peer };
  }

  /** Records the volume and distance the peer last reported for this link. */
  applyVolumeSync(peerId: string, volume: number, distance: number, nowMs = Date.now()): Peer | undefined {
    const peer = this.peers.get(peerId);
    if (!peer || peer.connectionState !== "connected") {
      return undefined;
    }
    peer.remoteVolume = volume;
    peer.remoteDistance = distance;
    peer.lastSeen = nowMs;
    this.changed(peer);
    return { ...peer };
  }

  setPairingState(peerId: string, state: PairingState): void {
    const peer = this.require(peerId);
    if (peer.pairingState === state) {
      return;
    }
    peer.pairingState = state;
    this.changed(peer);
  }

  setTokenExchange(peerId: string, state: TokenExchangeState): void {
    const peer = this.peers.get(peerId);
    if (!peer || peer.tokenExchange === state) {
      return;
    }
    peer.tokenExchange = state;
    this.changed(peer);
  }

  purgeStale(timeoutMs = 30_000, nowMs = Date.now()): string[] {
    const removed: string[] = [];
    for (const peer of Array.from(this.peers.values())) {
      if (isActive(peer)) {
        continue;
      }
      if (nowMs - peer.lastSeen > timeoutMs) {
        this.remove(peer.id);
        removed.push(peer.id);
      }
    }
    if (removed.length > 0) {
      this.logger.info({ removed }, "purged stale peers");
    }
    return removed;
  }

  /** Toggles the target; at most one peer is selected at a time. */
  select(peerId: string): string | undefined {
    const target = this.require(peerId);
    const nextSelected = !target.selected;
    for (const peer of this.peers.values()) {
      const selected = nextSelected && peer.id === peerId;
      if (peer.selected !== selected) {
        peer.selected = selected;
        this.changed(peer);
      }
    }
    return nextSelected ? peerId : undefined;
  }

  /** Drops every non-paired peer and resets the paired ones. */
  reset(): void {
    for (const peer of Array.from(this.peers.values())) {
      if (peer.pairingState === "paired") {
        this.markDisconnected(peer.id);
      } else {
        this.remove(peer.id);
      }
    }
  }

  private require(peerId: string): Peer {
    const peer = this.peers.get(peerId);
    if (!peer) {
      throw new UnknownPeerError(peerId);
    }
    return peer;
  }

  private setConnection(
    peerId: string,
    state: Peer["connectionState"],
    displayName: string | undefined,
    nowMs: number,
  ): Peer {
    const peer = this.peers.get(peerId) ?? this.create(peerId, displayName ?? peerId, nowMs);
    peer.connectionState = state;
    peer.lastSeen = nowMs;
    if (displayName) {
      peer.displayName = displayName;
    }
    this.changed(peer);
    return { ...peer };
  }

  private create(peerId: string, displayName: string, nowMs: number, overrides: Partial<Peer> = {}): Peer {
    const peer: Peer = {
      id: peerId,
      displayName,
      connectionState: "disconnected",
      pairingState: "none",
      providerType: "signalStrength",
      distance: 0,
      distanceLevel: "unknown",
      volume: UNRANGED_VOLUME,
      lastSeen: nowMs,
      isCompatiblePeer: false,
      selected: false,
      tokenExchange: "idle",
      ...overrides,
    };
    this.peers.set(peerId, peer);
    return peer;
  }

  private remove(peerId: string): void {
    if (!this.peers.delete(peerId)) {
      return;
    }
    this.estimator.removePeer(peerId);
    this.emit({ type: "peer.removed", peerId });
  }

  private changed(peer: Peer): void {
    this.emit({ type: "peer.updated", peer: { ...peer } });
  }
}
