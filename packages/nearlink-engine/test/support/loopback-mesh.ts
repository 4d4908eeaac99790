import { decodeMessage, type PeerMessage } from "../../src/codec.js";
import type { DiscoveredPeer, MeshTransport, TransportListener } from "../../src/transport.js";

/** In-process stand-in for the radio mesh; delivery is synchronous. */
export class LoopbackMesh {
  private readonly nodes = new Map<string, LoopbackTransport>();

  join(peerId: string, displayName: string): LoopbackTransport {
    const node = new LoopbackTransport(this, peerId, displayName);
    this.nodes.set(peerId, node);
    return node;
  }

  node(peerId: string): LoopbackTransport {
    const node = this.nodes.get(peerId);
    if (!node) {
      throw new Error(`No mesh node ${peerId}`);
    }
    return node;
  }

  /** `observer` hears an advertisement from `subject`. */
  advertise(observer: string, subject: string, rssi?: number): void {
    const target = this.node(subject);
    this.node(observer).listener?.peerFound({
      peerId: subject,
      displayName: target.displayName,
      rssi,
      compatible: true,
    });
  }

  connect(a: string, b: string): void {
    const left = this.node(a);
    const right = this.node(b);
    left.links.add(b);
    right.links.add(a);
    left.listener?.connectionState(b, "connected", right.displayName);
    right.listener?.connectionState(a, "connected", left.displayName);
  }

  disconnect(a: string, b: string): void {
    const left = this.node(a);
    const right = this.node(b);
    left.links.delete(b);
    right.links.delete(a);
    left.listener?.connectionState(b, "disconnected");
    right.listener?.connectionState(a, "disconnected");
  }

  deliver(from: string, to: string, bytes: Uint8Array): void {
    this.node(to).listener?.data(from, bytes);
  }
}

export class LoopbackTransport implements MeshTransport {
  listener: TransportListener | undefined;
  readonly links = new Set<string>();
  readonly sent: Array<{ to: string; message: PeerMessage }> = [];
  discovering = false;
  failSends = false;

  constructor(
    private readonly mesh: LoopbackMesh,
    readonly peerId: string,
    readonly displayName: string,
  ) {}

  startDiscovery(listener: TransportListener): void {
    this.listener = listener;
    this.discovering = true;
  }

  stopDiscovery(): void {
    this.discovering = false;
  }

  send(peerId: string, bytes: Uint8Array): void {
    if (this.failSends) {
      throw new Error("radio busy");
    }
    if (!this.links.has(peerId)) {
      throw new Error(`not connected to ${peerId}`);
    }
    const decoded = decodeMessage(bytes);
    if (decoded.kind === "message") {
      this.sent.push({ to: peerId, message: decoded.message });
    }
    this.mesh.deliver(this.peerId, peerId, bytes);
  }

  broadcast(bytes: Uint8Array): void {
    for (const peerId of this.links) {
      this.send(peerId, bytes);
    }
  }

  sentTypes(to?: string): string[] {
    return this.sent.filter((entry) => to === undefined || entry.to === to).map((entry) => entry.message.type);
  }

  /** Feeds a discovery result straight to this node's listener. */
  found(peer: DiscoveredPeer): void {
    this.listener?.peerFound(peer);
  }
}
