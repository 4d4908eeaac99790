import {
  DiscoveryTokenPayloadSchema,
  type EngineEvent,
  type TokenExchangeState,
} from "@nearlink/contracts";
import { createMessage, type PeerMessage } from "./codec.js";
import type { EngineLogger } from "./logger.js";
import type { PeerRegistry } from "./peer-registry.js";
import type { RangingCoordinator } from "./ranging.js";
import type { KeyedTimers } from "./timers.js";

export interface TokenExchangeDeps {
  registry: PeerRegistry;
  ranging: RangingCoordinator;
  timers: KeyedTimers;
  logger: EngineLogger;
  send: (peerId: string, message: PeerMessage) => void;
  emit: (event: EngineEvent) => void;
  onCompleted: (peerId: string) => void;
}

export interface TokenExchangeOptions {
  localName: string;
  timeoutMs: number;
}

function timerKey(peerId: string): string {
  return `token:${peerId}`;
}

/**
 * Swaps precise-ranging tokens with each connected peer. A side is done once
 * its own token was acknowledged or it holds the peer's token; it does not
 * wait for both.
 */
export class TokenExchangeProtocol {
  private readonly states = new Map<string, TokenExchangeState>();
  private readonly peerTokens = new Map<string, string>();

  constructor(
    private readonly deps: TokenExchangeDeps,
    private readonly options: TokenExchangeOptions,
  ) {}

  state(peerId: string): TokenExchangeState {
    return this.states.get(peerId) ?? "idle";
  }

  peerToken(peerId: string): string | undefined {
    return this.peerTokens.get(peerId);
  }

  /** Sends the local token; a no-op while no precise session has produced one. */
  begin(peerId: string): boolean {
    const token = this.deps.ranging.localToken;
    if (!token) {
      this.deps.logger.debug({ peerId }, "no local ranging token, token exchange skipped");
      return false;
    }
    if (this.state(peerId) !== "idle") {
      return false;
    }

    try {
      this.deps.send(peerId, createMessage("discovery-token", { token, sender: this.options.localName }));
    } catch (error) {
      this.deps.logger.warn({ err: error, peerId }, "failed to send ranging token");
      return false;
    }
    this.setState(peerId, "waiting");
    this.deps.timers.set(timerKey(peerId), this.options.timeoutMs, () => this.expire(peerId));
    return true;
  }

  handleToken(message: PeerMessage, fromPeerId: string): void {
    const parsed = DiscoveryTokenPayloadSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.deps.logger.warn({ peerId: fromPeerId }, "malformed ranging token dropped");
      return;
    }
    if (!this.deps.ranging.isRunning("precise")) {
      this.deps.logger.info({ peerId: fromPeerId }, "ranging token dropped, precise ranging inactive");
      return;
    }

    this.peerTokens.set(fromPeerId, parsed.data.token);
    this.setState(fromPeerId, "received");
    this.deps.ranging.configurePeer(fromPeerId, parsed.data.token);

    try {
      this.deps.send(fromPeerId, createMessage("token-ack", { ack: "true" }));
    } catch (error) {
      this.deps.logger.warn({ err: error, peerId: fromPeerId }, "failed to acknowledge ranging token");
    }
    this.complete(fromPeerId);
  }

  handleAck(fromPeerId: string): void {
    if (this.state(fromPeerId) !== "waiting") {
      this.deps.logger.debug({ peerId: fromPeerId, state: this.state(fromPeerId) }, "token ack ignored");
      return;
    }
    this.complete(fromPeerId);
  }

  /** Forgets the peer's token and returns it to idle. */
  resetPeer(peerId: string): void {
    this.deps.timers.cancel(timerKey(peerId));
    this.peerTokens.delete(peerId);
    this.states.delete(peerId);
    this.deps.registry.setTokenExchange(peerId, "idle");
  }

  reset(): void {
    for (const peerId of Array.from(this.states.keys())) {
      this.resetPeer(peerId);
    }
    this.deps.timers.cancelMatching("token:");
  }

  private complete(peerId: string): void {
    this.deps.timers.cancel(timerKey(peerId));
    this.setState(peerId, "completed");
    this.deps.emit({ type: "token.completed", peerId });
    this.deps.logger.info({ peerId }, "token exchange completed");
    this.deps.onCompleted(peerId);
  }

  private expire(peerId: string): void {
    if (this.state(peerId) !== "waiting") {
      return;
    }
    this.setState(peerId, "idle");
    this.states.delete(peerId);
    this.deps.logger.info({ peerId }, "token exchange timed out");
    this.deps.emit({ type: "token.timeout", peerId });
  }

  private setState(peerId: string, state: TokenExchangeState): void {
    this.states.set(peerId, state);
    this.deps.registry.setTokenExchange(peerId, state);
  }
}
