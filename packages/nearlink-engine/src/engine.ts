import {
  DeviceInfoPayloadSchema,
  VolumeSyncPayloadSchema,
  type AppState,
  type ConnectionState,
  type EngineEvent,
  type EngineSnapshot,
  type PairedDevice,
  type ProviderType,
} from "@nearlink/contracts";
import { ApplicationStateMachine } from "./app-state.js";
import { createMessage, decodeMessage, encodeMessage, type PeerMessage } from "./codec.js";
import { DistanceEstimator, type DistanceEstimatorOptions } from "./distance-estimator.js";
import { MessageDecodeError, NoRangingSourceError, PeerSendError, UnknownPeerError } from "./errors.js";
import { silentLogger, type EngineLogger } from "./logger.js";
import { PairingProtocol } from "./pairing.js";
import { PeerRegistry } from "./peer-registry.js";
import { RangingCoordinator, type RangingSink, type RangingSources } from "./ranging.js";
import { SerialQueue } from "./serial-queue.js";
import { PairedDeviceLedger, type PairedDeviceStore } from "./store.js";
import { KeyedTimers } from "./timers.js";
import { TokenExchangeProtocol } from "./token-exchange.js";
import type { DiscoveredPeer, MeshTransport, TransportListener } from "./transport.js";

export type EngineListener = (event: EngineEvent) => void;

export interface ProximityEngineDeps {
  transport: MeshTransport;
  ranging: RangingSources;
  store: PairedDeviceStore;
  logger?: EngineLogger;
  now?: () => number;
}

export interface ProximityEngineOptions {
  localName: string;
  estimator?: Partial<DistanceEstimatorOptions>;
  staleTimeoutMs?: number;
  staleSweepMs?: number;
  pairingTimeoutMs?: number;
  tokenExchangeTimeoutMs?: number;
  /** Interval of the heartbeat and volume-sync round to connected peers. */
  heartbeatIntervalMs?: number;
}

const DEFAULTS = {
  staleTimeoutMs: 30_000,
  staleSweepMs: 5_000,
  pairingTimeoutMs: 30_000,
  tokenExchangeTimeoutMs: 10_000,
  heartbeatIntervalMs: 10_000,
};

/**
 * Owns every engine component. Transport callbacks, ranging samples, timer
 * expiries and commands all run on one serial queue, so no two of them ever
 * interleave.
 */
export class ProximityEngine {
  readonly estimator: DistanceEstimator;
  private readonly logger: EngineLogger;
  private readonly now: () => number;
  private readonly queue: SerialQueue;
  private readonly timers: KeyedTimers;
  private readonly registry: PeerRegistry;
  private readonly ledger: PairedDeviceLedger;
  private readonly ranging: RangingCoordinator;
  private readonly pairing: PairingProtocol;
  private readonly tokens: TokenExchangeProtocol;
  private readonly state: ApplicationStateMachine;
  private readonly listeners = new Set<EngineListener>();
  private readonly settings: typeof DEFAULTS;
  private sweep: ReturnType<typeof setInterval> | undefined;
  private heartbeat: ReturnType<typeof setInterval> | undefined;
  private loaded = false;
  private running = false;

  constructor(
    private readonly deps: ProximityEngineDeps,
    private readonly options: ProximityEngineOptions,
  ) {
    this.logger = deps.logger ?? silentLogger();
    this.now = deps.now ?? Date.now;
    this.settings = {
      staleTimeoutMs: options.staleTimeoutMs ?? DEFAULTS.staleTimeoutMs,
      staleSweepMs: options.staleSweepMs ?? DEFAULTS.staleSweepMs,
      pairingTimeoutMs: options.pairingTimeoutMs ?? DEFAULTS.pairingTimeoutMs,
      tokenExchangeTimeoutMs: options.tokenExchangeTimeoutMs ?? DEFAULTS.tokenExchangeTimeoutMs,
      heartbeatIntervalMs: options.heartbeatIntervalMs ?? DEFAULTS.heartbeatIntervalMs,
    };

    const emit = (event: EngineEvent): void => this.emit(event);
    this.estimator = new DistanceEstimator(options.estimator);
    this.queue = new SerialQueue(this.logger);
    this.timers = new KeyedTimers((label, task) => this.queue.post(label, task));
    this.registry = new PeerRegistry(this.estimator, this.logger, emit);
    this.ledger = new PairedDeviceLedger(deps.store);
    this.ranging = new RangingCoordinator(deps.ranging, this.logger);
    this.state = new ApplicationStateMachine(this.logger, emit, () => !this.registry.hasConnectedPairedPeer());

    const send = (peerId: string, message: PeerMessage): void => this.send(peerId, message);
    this.pairing = new PairingProtocol(
      {
        registry: this.registry,
        ledger: this.ledger,
        timers: this.timers,
        logger: this.logger,
        send,
        emit,
        now: this.now,
      },
      { localName: options.localName, timeoutMs: this.settings.pairingTimeoutMs },
    );
    this.tokens = new TokenExchangeProtocol(
      {
        registry: this.registry,
        ranging: this.ranging,
        timers: this.timers,
        logger: this.logger,
        send,
        emit,
        onCompleted: (peerId) => this.onTokenCompleted(peerId),
      },
      { localName: options.localName, timeoutMs: this.settings.tokenExchangeTimeoutMs },
    );
  }

  get appState(): AppState {
    return this.state.state;
  }

  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): EngineSnapshot {
    return {
      state: this.state.state,
      errorMessage: this.state.errorMessage,
      activeProvider: this.ranging.activeProvider,
      discoverable: this.registry.discoverable(),
      active: this.registry.active(),
      inboundRequest: this.pairing.inboundRequest,
    };
  }

  pairedDevices(): PairedDevice[] {
    return this.ledger.list();
  }

  /** Loads paired devices and shows them as disconnected peers. Idempotent. */
  init(): Promise<void> {
    return this.queue.run(() => this.load());
  }

  /**
   * Starts ranging, then discovery. Leaves the error state first when in it.
   * Rejects with NoRangingSourceError, after entering the error state, when
   * no ranging source starts.
   */
  start(): Promise<void> {
    return this.queue.run(async () => {
      await this.load();
      if (this.state.state === "error") {
        // Whatever survived the failure is torn down and started again.
        this.halt();
        this.tokens.reset();
        for (const peer of this.registry.list()) {
          this.registry.revertToFallback(peer.id);
        }
        this.state.transition("idle");
      }
      if (this.state.state !== "idle") {
        return;
      }

      try {
        const result = await this.ranging.start(this.rangingSink());
        if (result.notice) {
          this.emit({ type: "ranging.notice", provider: result.active, message: result.notice });
        }
      } catch (error) {
        if (error instanceof NoRangingSourceError) {
          this.state.fail("No ranging source is available on this device", "ranging");
        }
        throw error;
      }

      try {
        this.deps.transport.startDiscovery(this.transportListener());
      } catch (error) {
        this.ranging.stop();
        this.state.fail("Peer discovery could not start", "transport");
        throw error;
      }

      this.running = true;
      this.state.transition("discovering");
      if (this.registry.connectedIds().length > 0) {
        this.state.transition("connected");
      }
      this.sweep = setInterval(() => {
        this.queue.post("stale-sweep", () => {
          this.registry.purgeStale(this.settings.staleTimeoutMs, this.now());
        });
      }, this.settings.staleSweepMs);
      this.heartbeat = setInterval(() => {
        this.queue.post("heartbeat", () => this.heartbeatRound());
      }, this.settings.heartbeatIntervalMs);
    });
  }

  stop(): Promise<void> {
    return this.queue.run(() => {
      this.halt();
      this.pairing.reset();
      this.tokens.reset();
      this.registry.reset();
      this.timers.cancelAll();
      this.walkToIdle();
    });
  }

  select(peerId: string): Promise<string | undefined> {
    return this.queue.run(() => this.registry.select(peerId));
  }

  requestPairing(peerId: string): Promise<boolean> {
    return this.queue.run(() => this.pairing.requestPairing(peerId));
  }

  acceptPairing(peerId: string): Promise<boolean> {
    return this.queue.run(() => this.pairing.acceptPairing(peerId));
  }

  rejectPairing(peerId: string): Promise<boolean> {
    return this.queue.run(() => this.pairing.rejectPairing(peerId));
  }

  unpair(peerId: string): Promise<boolean> {
    return this.queue.run(() => {
      if (!this.registry.has(peerId) && !this.ledger.has(peerId)) {
        throw new UnknownPeerError(peerId);
      }
      const unpaired = this.pairing.unpair(peerId);
      if (unpaired && this.registry.get(peerId)?.connectionState === "disconnected") {
        this.registry.markDisconnected(peerId);
      }
      return unpaired;
    });
  }

  purgeStale(): Promise<string[]> {
    return this.queue.run(() => this.registry.purgeStale(this.settings.staleTimeoutMs, this.now()));
  }

  /** Enters the error state, or raises a banner while a paired peer is connected. */
  reportSubsystemFailure(subsystem: string, message: string): Promise<boolean> {
    return this.queue.run(() => this.state.fail(message, subsystem));
  }

  /** Resolves once every queued task, and any pending store write, has finished. */
  async idle(): Promise<void> {
    await this.queue.drain();
    await this.ledger.flush();
  }

  handlePeerFound(peer: DiscoveredPeer): void {
    this.queue.post("peer-found", () => {
      this.registry.upsertDiscovered(peer.peerId, peer.displayName, peer.rssi, peer.compatible, this.now());
    });
  }

  handlePeerLost(peerId: string): void {
    this.queue.post("peer-lost", () => {
      this.registry.markLost(peerId);
    });
  }

  handleConnectionState(peerId: string, state: ConnectionState, displayName?: string): void {
    this.queue.post("connection-state", () => {
      switch (state) {
        case "connecting":
          this.registry.markConnecting(peerId, displayName, this.now());
          return;
        case "connected":
          this.onConnected(peerId, displayName);
          return;
        case "disconnected":
          this.onDisconnected(peerId);
          return;
      }
    });
  }

  handleData(peerId: string, bytes: Uint8Array): void {
    this.queue.post("peer-data", () => this.onData(peerId, bytes));
  }

  handleRangingSample(kind: ProviderType, peerId: string, value: number): void {
    this.queue.post("ranging-sample", () => {
      if (kind === "signalStrength" && this.isRangedPrecisely(peerId)) {
        return;
      }
      this.registry.applyDistanceUpdate(peerId, value, kind, this.now());
    });
  }

  handleLocalToken(token: string): void {
    this.queue.post("local-token", () => {
      this.logger.debug({ length: token.length }, "local ranging token available");
      for (const peerId of this.registry.connectedIds()) {
        this.tokens.begin(peerId);
      }
    });
  }

  handleRangingInvalidated(kind: ProviderType, peerId: string | undefined, reason: string): void {
    this.queue.post("ranging-invalidated", () => {
      if (kind === "signalStrength") {
        this.logger.warn({ kind, peerId, reason }, "signal strength ranging invalidated");
        if (peerId === undefined && !this.ranging.activeProvider) {
          this.state.fail(`Ranging stopped: ${reason}`, "ranging");
        }
        return;
      }
      if (peerId !== undefined) {
        this.registry.revertToFallback(peerId);
        this.tokens.resetPeer(peerId);
      } else {
        this.tokens.reset();
        for (const peer of this.registry.list()) {
          this.registry.revertToFallback(peer.id);
        }
        if (this.ranging.activeProvider) {
          this.emit({
            type: "ranging.notice",
            provider: this.ranging.activeProvider,
            message: "Precise ranging stopped; using signal strength with reduced accuracy",
          });
        } else {
          this.state.fail(`Ranging stopped: ${reason}`, "ranging");
        }
      }
      this.settleTransmitting();
    });
  }

  private async load(): Promise<void> {
    if (this.loaded) {
      return;
    }
    this.loaded = true;
    try {
      const devices = await this.ledger.load();
      this.registry.rehydrate(devices, this.now());
      this.logger.info({ count: devices.length }, "paired devices loaded");
    } catch (error) {
      this.logger.error({ err: error }, "failed to load paired devices");
      this.emit({ type: "error.banner", subsystem: "storage", message: "Paired devices could not be loaded" });
    }
  }

  private onConnected(peerId: string, displayName: string | undefined): void {
    this.registry.markConnected(peerId, displayName, this.now());
    this.pairing.peerConnected(peerId);
    try {
      this.send(peerId, createMessage("handshake", { displayName: this.options.localName }, this.now()));
      this.send(peerId, createMessage("device-info", {
        displayName: this.options.localName,
        compatible: "true",
      }, this.now()));
    } catch (error) {
      this.logger.warn({ err: error, peerId }, "failed to send handshake");
    }
    this.tokens.begin(peerId);
    if (this.state.state === "discovering") {
      this.state.transition("connected");
    }
  }

  private onDisconnected(peerId: string): void {
    this.pairing.peerDisconnected(peerId);
    this.tokens.resetPeer(peerId);
    this.registry.markDisconnected(peerId);

    if (this.registry.connectedIds().length > 0) {
      this.settleTransmitting();
      return;
    }
    if (this.state.state === "transmitting") {
      this.state.transition("connected");
    }
    if (this.state.state === "connected") {
      this.state.transition("idle");
      this.state.transition("discovering");
    }
  }

  private onData(peerId: string, bytes: Uint8Array): void {
    let message: PeerMessage;
    try {
      const decoded = decodeMessage(bytes);
      if (decoded.kind === "ignored") {
        this.logger.debug({ peerId, type: decoded.type }, "unknown message type ignored");
        return;
      }
      message = decoded.message;
    } catch (error) {
      if (error instanceof MessageDecodeError) {
        this.logger.warn({ peerId, err: error }, "malformed message dropped");
        return;
      }
      throw error;
    }

    this.registry.touch(peerId, this.now());
    switch (message.type) {
      case "handshake":
      case "heartbeat":
        return;
      case "volume-sync":
        this.onVolumeSync(message, peerId);
        return;
      case "audio-stream":
        this.logger.debug({ peerId }, "audio stream message ignored");
        return;
      case "device-info":
        this.onDeviceInfo(message, peerId);
        return;
      case "disconnect":
        this.pairing.handleDisconnectNotice(message, peerId);
        return;
      case "pairing-request":
        this.pairing.handleIncomingRequest(message, peerId);
        return;
      case "pairing-accept":
        this.pairing.handleAccept(peerId);
        return;
      case "pairing-reject":
        this.pairing.handleReject(peerId);
        return;
      case "discovery-token":
        this.tokens.handleToken(message, peerId);
        return;
      case "token-ack":
        this.tokens.handleAck(peerId);
        return;
      default: {
        const unhandled: never = message.type;
        this.logger.warn({ peerId, type: unhandled }, "unhandled message type");
      }
    }
  }

  private onDeviceInfo(message: PeerMessage, peerId: string): void {
    const parsed = DeviceInfoPayloadSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.logger.warn({ peerId }, "malformed device info dropped");
      return;
    }
    const peer = this.registry.applyDeviceInfo(peerId, parsed.data.displayName, parsed.data.compatible === "true", this.now());
    if (peer) {
      this.pairing.peerRenamed(peerId, parsed.data.displayName);
    }
  }

  private onVolumeSync(message: PeerMessage, peerId: string): void {
    const parsed = VolumeSyncPayloadSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.logger.warn({ peerId }, "malformed volume sync dropped");
      return;
    }
    this.registry.applyVolumeSync(peerId, parsed.data.volume, parsed.data.distance, this.now());
  }

  /** Heartbeat to every link, then our volume for each ranged connected peer. */
  private heartbeatRound(): void {
    const connected = this.registry.connectedIds();
    if (connected.length === 0) {
      return;
    }
    try {
      this.deps.transport.broadcast(encodeMessage(createMessage("heartbeat", {}, this.now())));
    } catch (error) {
      this.logger.warn({ err: error }, "heartbeat broadcast failed");
    }
    for (const peerId of connected) {
      const peer = this.registry.get(peerId);
      if (!peer || peer.distanceLevel === "unknown") {
        continue;
      }
      try {
        this.send(peerId, createMessage("volume-sync", {
          volume: String(peer.volume),
          distance: String(peer.distance),
        }, this.now()));
      } catch (error) {
        this.logger.warn({ err: error, peerId }, "volume sync send failed");
      }
    }
  }

  private onTokenCompleted(peerId: string): void {
    if (this.state.state === "connected" && this.registry.get(peerId)?.connectionState === "connected") {
      this.state.transition("transmitting");
    }
  }

  private settleTransmitting(): void {
    if (this.state.state !== "transmitting") {
      return;
    }
    const ranged = this.registry
      .list()
      .some((peer) => peer.connectionState === "connected" && peer.tokenExchange === "completed");
    if (!ranged) {
      this.state.transition("connected");
    }
  }

  private isRangedPrecisely(peerId: string): boolean {
    return this.ranging.isRunning("precise") && this.tokens.state(peerId) === "completed";
  }

  private walkToIdle(): void {
    switch (this.state.state) {
      case "transmitting":
        this.state.transition("connected");
        this.state.transition("idle");
        return;
      case "connected":
      case "discovering":
      case "error":
        this.state.transition("idle");
        return;
      case "idle":
        return;
    }
  }

  private halt(): void {
    clearInterval(this.sweep);
    clearInterval(this.heartbeat);
    this.sweep = undefined;
    this.heartbeat = undefined;
    if (!this.running) {
      return;
    }
    this.running = false;
    this.deps.transport.stopDiscovery();
    this.ranging.stop();
  }

  private send(peerId: string, message: PeerMessage): void {
    try {
      this.deps.transport.send(peerId, encodeMessage(message));
    } catch (error) {
      throw new PeerSendError(peerId, error);
    }
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, "engine listener failed");
      }
    }
  }

  private transportListener(): TransportListener {
    return {
      peerFound: (peer) => this.handlePeerFound(peer),
      peerLost: (peerId) => this.handlePeerLost(peerId),
      connectionState: (peerId, state, displayName) => this.handleConnectionState(peerId, state, displayName),
      data: (peerId, bytes) => this.handleData(peerId, bytes),
    };
  }

  private rangingSink(): RangingSink {
    return {
      sample: (kind, peerId, value) => this.handleRangingSample(kind, peerId, value),
      localToken: (token) => this.handleLocalToken(token),
      invalidated: (kind, peerId, reason) => this.handleRangingInvalidated(kind, peerId, reason),
    };
  }
}
