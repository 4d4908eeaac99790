import {
  DisconnectPayloadSchema,
  PairingRequestPayloadSchema,
  type EngineEvent,
  type InboundPairingRequest,
} from "@nearlink/contracts";
import { createMessage, type PeerMessage } from "./codec.js";
import { UnknownPeerError } from "./errors.js";
import type { EngineLogger } from "./logger.js";
import type { PeerRegistry } from "./peer-registry.js";
import type { PairedDeviceLedger } from "./store.js";
import type { KeyedTimers } from "./timers.js";

export const UNPAIR_REASON = "unpair";

type Direction = "outbound" | "inbound";

export interface PairingDeps {
  registry: PeerRegistry;
  ledger: PairedDeviceLedger;
  timers: KeyedTimers;
  logger: EngineLogger;
  /** Throws PeerSendError when the transport rejects the message. */
  send: (peerId: string, message: PeerMessage) => void;
  emit: (event: EngineEvent) => void;
  now?: () => number;
}

export interface PairingOptions {
  localName: string;
  timeoutMs: number;
}

function timerKey(peerId: string): string {
  return `pairing:${peerId}`;
}

/**
 * Per-peer pairing: none -> pending -> paired, pending -> none on reject or
 * timeout, paired -> none on unpair. Only one inbound request is surfaced at a
 * time; others arriving meanwhile are dropped.
 */
export class PairingProtocol {
  private readonly directions = new Map<string, Direction>();
  private inbound: InboundPairingRequest | undefined;
  private readonly now: () => number;

  constructor(
    private readonly deps: PairingDeps,
    private readonly options: PairingOptions,
  ) {
    this.now = deps.now ?? Date.now;
  }

  get inboundRequest(): InboundPairingRequest | undefined {
    return this.inbound ? { ...this.inbound } : undefined;
  }

  requestPairing(peerId: string): boolean {
    const peer = this.deps.registry.get(peerId);
    if (!peer) {
      throw new UnknownPeerError(peerId);
    }
    if (peer.pairingState !== "none") {
      this.deps.logger.warn({ peerId, pairingState: peer.pairingState }, "pairing request ignored in current state");
      return false;
    }

    this.deps.registry.setPairingState(peerId, "pending");
    this.directions.set(peerId, "outbound");
    try {
      this.deps.send(peerId, createMessage("pairing-request", { deviceName: this.options.localName }, this.now()));
    } catch (error) {
      this.directions.delete(peerId);
      this.deps.registry.setPairingState(peerId, "none");
      throw error;
    }
    this.deps.timers.set(timerKey(peerId), this.options.timeoutMs, () => this.expire(peerId));
    this.deps.logger.info({ peerId }, "pairing requested");
    return true;
  }

  handleIncomingRequest(message: PeerMessage, fromPeerId: string): void {
    const parsed = PairingRequestPayloadSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.deps.logger.warn({ peerId: fromPeerId }, "malformed pairing request dropped");
      return;
    }
    const peer = this.deps.registry.get(fromPeerId);
    if (!peer) {
      this.deps.logger.warn({ peerId: fromPeerId }, "pairing request from unknown peer dropped");
      return;
    }

    if (peer.pairingState === "paired") {
      this.sendBestEffort(fromPeerId, "pairing-accept");
      return;
    }

    if (peer.pairingState === "pending" && this.directions.get(fromPeerId) === "outbound") {
      // Both sides asked at once: treat the crossing request as consent.
      this.complete(fromPeerId, parsed.data.deviceName);
      this.sendBestEffort(fromPeerId, "pairing-accept");
      return;
    }

    if (this.inbound) {
      this.deps.logger.info(
        { peerId: fromPeerId, outstanding: this.inbound.peerId },
        "pairing request dropped while another is outstanding",
      );
      return;
    }

    this.inbound = { peerId: fromPeerId, deviceName: parsed.data.deviceName, receivedAt: this.now() };
    this.directions.set(fromPeerId, "inbound");
    this.deps.registry.setPairingState(fromPeerId, "pending");
    this.deps.timers.set(timerKey(fromPeerId), this.options.timeoutMs, () => this.expire(fromPeerId));
    this.deps.emit({ type: "pairing.request", request: { ...this.inbound } });
  }

  acceptPairing(peerId: string): boolean {
    const peer = this.deps.registry.get(peerId);
    if (!peer) {
      throw new UnknownPeerError(peerId);
    }
    if (peer.pairingState === "paired") {
      return false;
    }
    const request = this.inbound;
    if (!request || request.peerId !== peerId || peer.pairingState !== "pending") {
      this.deps.logger.warn({ peerId }, "accept ignored without an outstanding request from peer");
      return false;
    }

    this.deps.send(peerId, createMessage("pairing-accept", { deviceName: this.options.localName }, this.now()));
    this.complete(peerId, request.deviceName);
    return true;
  }

  rejectPairing(peerId: string): boolean {
    if (this.inbound?.peerId !== peerId) {
      this.deps.logger.warn({ peerId }, "reject ignored without an outstanding request from peer");
      return false;
    }
    this.clear(peerId);
    this.deps.send(peerId, createMessage("pairing-reject", {}, this.now()));
    return true;
  }

  handleAccept(fromPeerId: string): void {
    const peer = this.deps.registry.get(fromPeerId);
    if (!peer || peer.pairingState !== "pending" || this.directions.get(fromPeerId) !== "outbound") {
      this.deps.logger.warn({ peerId: fromPeerId }, "unexpected pairing accept ignored");
      return;
    }
    this.complete(fromPeerId, peer.displayName);
  }

  handleReject(fromPeerId: string): void {
    const peer = this.deps.registry.get(fromPeerId);
    if (!peer || peer.pairingState !== "pending" || this.directions.get(fromPeerId) !== "outbound") {
      this.deps.logger.warn({ peerId: fromPeerId }, "unexpected pairing reject ignored");
      return;
    }
    this.clear(fromPeerId);
    this.deps.emit({ type: "pairing.rejected", peerId: fromPeerId });
  }

  /** No-op unless the peer is paired. The remote side is told best-effort. */
  unpair(peerId: string): boolean {
    const peer = this.deps.registry.get(peerId);
    if (!this.deps.ledger.has(peerId) && peer?.pairingState !== "paired") {
      return false;
    }
    this.forget(peerId);
    if (peer?.connectionState === "connected") {
      this.sendBestEffort(peerId, "disconnect", { reason: UNPAIR_REASON });
    }
    return true;
  }

  handleDisconnectNotice(message: PeerMessage, fromPeerId: string): void {
    const parsed = DisconnectPayloadSchema.safeParse(message.payload);
    if (!parsed.success || parsed.data.reason !== UNPAIR_REASON) {
      return;
    }
    if (this.deps.ledger.has(fromPeerId) || this.deps.registry.get(fromPeerId)?.pairingState === "paired") {
      this.forget(fromPeerId);
    }
  }

  peerConnected(peerId: string): void {
    if (this.deps.ledger.touch(peerId, this.now())) {
      this.persist();
    }
  }

  peerRenamed(peerId: string, name: string): void {
    if (this.deps.ledger.rename(peerId, name)) {
      this.persist();
    }
  }

  peerDisconnected(peerId: string): void {
    if (this.directions.has(peerId)) {
      this.clear(peerId);
    }
  }

  reset(): void {
    for (const peerId of Array.from(this.directions.keys())) {
      this.clear(peerId);
    }
    this.deps.timers.cancelMatching("pairing:");
    this.inbound = undefined;
  }

  private complete(peerId: string, name: string): void {
    this.deps.timers.cancel(timerKey(peerId));
    this.directions.delete(peerId);
    if (this.inbound?.peerId === peerId) {
      this.inbound = undefined;
    }
    this.deps.registry.setPairingState(peerId, "paired");

    const nowMs = this.now();
    this.deps.ledger.add({ id: peerId, name, pairedAt: nowMs, lastConnected: nowMs });
    this.persist();

    const device = this.deps.ledger.get(peerId);
    if (device) {
      this.deps.emit({ type: "pairing.completed", device });
    }
    this.deps.logger.info({ peerId }, "paired");
  }

  private forget(peerId: string): void {
    if (this.deps.ledger.remove(peerId)) {
      this.persist();
    }
    if (this.deps.registry.has(peerId)) {
      this.deps.registry.setPairingState(peerId, "none");
    }
    this.deps.emit({ type: "pairing.unpaired", peerId });
    this.deps.logger.info({ peerId }, "unpaired");
  }

  /** Reverts a pending peer to none and frees the inbound slot if it held it. */
  private clear(peerId: string): void {
    this.deps.timers.cancel(timerKey(peerId));
    this.directions.delete(peerId);
    if (this.inbound?.peerId === peerId) {
      this.inbound = undefined;
    }
    const peer = this.deps.registry.get(peerId);
    if (peer?.pairingState === "pending") {
      this.deps.registry.setPairingState(peerId, "none");
    }
  }

  private expire(peerId: string): void {
    const peer = this.deps.registry.get(peerId);
    if (!this.directions.has(peerId) || peer?.pairingState !== "pending") {
      return;
    }
    this.clear(peerId);
    this.deps.logger.info({ peerId }, "pairing timed out");
    this.deps.emit({ type: "pairing.timeout", peerId });
  }

  private sendBestEffort(peerId: string, type: "pairing-accept" | "disconnect", payload: Record<string, string> = {}): void {
    const body = type === "pairing-accept" ? { deviceName: this.options.localName, ...payload } : payload;
    try {
      this.deps.send(peerId, createMessage(type, body, this.now()));
    } catch (error) {
      this.deps.logger.warn({ err: error, peerId, type }, "best-effort send failed");
    }
  }

  private persist(): void {
    this.deps.ledger.persist().catch((error: unknown) => {
      this.deps.logger.error({ err: error }, "failed to persist paired devices");
      this.deps.emit({
        type: "error.banner",
        subsystem: "storage",
        message: "Paired devices could not be saved",
      });
    });
  }
}
