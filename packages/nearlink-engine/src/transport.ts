import type { ConnectionState } from "@nearlink/contracts";

export interface DiscoveredPeer {
  peerId: string;
  displayName: string;
  rssi?: number;
  compatible?: boolean;
}

export interface TransportListener {
  peerFound(peer: DiscoveredPeer): void;
  peerLost(peerId: string): void;
  connectionState(peerId: string, state: ConnectionState, displayName?: string): void;
  data(peerId: string, bytes: Uint8Array): void;
}

/**
 * Mesh/BLE transport boundary. `send` and `broadcast` throw when the
 * transport rejects the bytes.
 */
export interface MeshTransport {
  startDiscovery(listener: TransportListener): void;
  stopDiscovery(): void;
  send(peerId: string, bytes: Uint8Array): void;
  broadcast(bytes: Uint8Array): void;
}
