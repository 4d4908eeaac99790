import type { BridgeInbound, BridgeOutbound, ProviderType } from "@nearlink/contracts";
import {
  fromBase64,
  RangingUnavailableError,
  toBase64,
  type EngineLogger,
  type MeshTransport,
  type RangingListener,
  type RangingSource,
  type TransportListener,
} from "@nearlink/engine";

type Outbound = (frame: BridgeOutbound) => void;

interface PendingStart {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class BridgeUnavailableError extends Error {
  constructor() {
    super("Host bridge is not connected");
    this.name = "BridgeUnavailableError";
  }
}

/** Radio transport carried over the host bridge socket. */
export class BridgeTransport implements MeshTransport {
  listener: TransportListener | undefined;

  constructor(private readonly hub: HostBridge) {}

  startDiscovery(listener: TransportListener): void {
    this.hub.post({ type: "transport.discovery", enabled: true });
    this.listener = listener;
  }

  stopDiscovery(): void {
    this.listener = undefined;
    if (this.hub.attached) {
      this.hub.post({ type: "transport.discovery", enabled: false });
    }
  }

  send(peerId: string, bytes: Uint8Array): void {
    this.hub.post({ type: "transport.send", peerId, data: toBase64(bytes) });
  }

  broadcast(bytes: Uint8Array): void {
    this.hub.post({ type: "transport.send", data: toBase64(bytes) });
  }
}

/**
 * A ranging source driven by the host. `start` resolves when the host reports
 * `ranging.started` for this kind and rejects on `ranging.failed` or timeout.
 */
export class BridgeRangingSource implements RangingSource {
  listener: RangingListener | undefined;
  private pending: PendingStart | undefined;

  constructor(
    readonly kind: ProviderType,
    private readonly hub: HostBridge,
    private readonly startTimeoutMs: number,
  ) {}

  isAvailable(): boolean {
    return this.hub.attached && this.hub.supports(this.kind);
  }

  start(listener: RangingListener): Promise<void> {
    this.settle(new RangingUnavailableError(this.kind, "superseded by a new start"));
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle(new RangingUnavailableError(this.kind, `host did not start within ${this.startTimeoutMs} ms`));
      }, this.startTimeoutMs);
      this.pending = {
        resolve: () => {
          this.listener = listener;
          resolve();
        },
        reject,
        timer,
      };
      try {
        this.hub.post({ type: "ranging.start", kind: this.kind });
      } catch (error) {
        this.settle(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  stop(): void {
    this.listener = undefined;
    this.settle(new RangingUnavailableError(this.kind, "stopped"));
    if (this.hub.attached) {
      this.hub.post({ type: "ranging.stop", kind: this.kind });
    }
  }

  configurePeer(peerId: string, token: string): void {
    this.hub.post({ type: "ranging.configure", peerId, token });
  }

  /** Completes an outstanding start; without `error` it succeeded. */
  settle(error?: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = undefined;
    clearTimeout(pending.timer);
    if (error) {
      pending.reject(error);
    } else {
      pending.resolve();
    }
  }
}

/**
 * Single attachment point for the native host. Inbound frames are routed to
 * the transport and ranging adapters; outbound frames go to whichever socket
 * is attached.
 */
export class HostBridge {
  readonly transport: BridgeTransport;
  readonly precise: BridgeRangingSource;
  readonly signalStrength: BridgeRangingSource;
  private outbound: Outbound | undefined;
  private capabilities: Record<ProviderType, boolean> = { precise: false, signalStrength: false };
  private readonly connectedPeers = new Set<string>();

  constructor(
    private readonly logger: EngineLogger,
    startTimeoutMs = 5000,
  ) {
    this.transport = new BridgeTransport(this);
    this.precise = new BridgeRangingSource("precise", this, startTimeoutMs);
    this.signalStrength = new BridgeRangingSource("signalStrength", this, startTimeoutMs);
  }

  get attached(): boolean {
    return this.outbound !== undefined;
  }

  supports(kind: ProviderType): boolean {
    return this.capabilities[kind];
  }

  /** Returns false when another host is already attached. */
  attach(outbound: Outbound): boolean {
    if (this.outbound) {
      return false;
    }
    this.outbound = outbound;
    this.logger.info("host bridge attached");
    return true;
  }

  /** Links the host reported are torn down, then both ranging sessions end. */
  detach(outbound: Outbound): void {
    if (this.outbound !== outbound) {
      return;
    }
    this.outbound = undefined;
    this.capabilities = { precise: false, signalStrength: false };
    const links = Array.from(this.connectedPeers);
    this.connectedPeers.clear();
    for (const peerId of links) {
      this.transport.listener?.connectionState(peerId, "disconnected");
    }
    for (const source of [this.precise, this.signalStrength]) {
      source.settle(new RangingUnavailableError(source.kind, "host bridge detached"));
      const listener = source.listener;
      source.listener = undefined;
      listener?.invalidated(undefined, "host bridge detached");
    }
    this.logger.warn("host bridge detached");
  }

  post(frame: BridgeOutbound): void {
    if (!this.outbound) {
      throw new BridgeUnavailableError();
    }
    this.outbound(frame);
  }

  handleFrame(frame: BridgeInbound): void {
    switch (frame.type) {
      case "bridge.hello":
        this.capabilities = { precise: frame.precise, signalStrength: frame.signalStrength };
        this.logger.info({ capabilities: this.capabilities }, "host bridge capabilities");
        return;
      case "peer.found":
        this.transport.listener?.peerFound({
          peerId: frame.peerId,
          displayName: frame.displayName,
          rssi: frame.rssi,
          compatible: frame.compatible,
        });
        return;
      case "peer.lost":
        this.transport.listener?.peerLost(frame.peerId);
        return;
      case "peer.connection":
        if (frame.state === "connected") {
          this.connectedPeers.add(frame.peerId);
        } else if (frame.state === "disconnected") {
          this.connectedPeers.delete(frame.peerId);
        }
        this.transport.listener?.connectionState(frame.peerId, frame.state, frame.displayName);
        return;
      case "peer.data":
        this.transport.listener?.data(frame.peerId, fromBase64(frame.data));
        return;
      case "ranging.sample":
        this.source(frame.source).listener?.sample(frame.peerId, frame.value);
        return;
      case "ranging.started":
        this.source(frame.kind).settle();
        return;
      case "ranging.failed":
        this.source(frame.kind).settle(new RangingUnavailableError(frame.kind, frame.reason));
        return;
      case "ranging.token":
        this.precise.listener?.localToken(frame.token);
        return;
      case "ranging.invalidated":
        this.precise.listener?.invalidated(frame.peerId, frame.reason);
        return;
    }
  }

  private source(kind: ProviderType): BridgeRangingSource {
    return kind === "precise" ? this.precise : this.signalStrength;
  }
}
