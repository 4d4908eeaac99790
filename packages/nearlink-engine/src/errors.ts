import type { ProviderType } from "@nearlink/contracts";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class RangingUnavailableError extends Error {
  constructor(readonly kind: ProviderType, reason: string) {
    super(`Ranging source ${kind} unavailable: ${reason}`);
    this.name = "RangingUnavailableError";
  }
}

export class NoRangingSourceError extends Error {
  constructor(readonly causes: Error[]) {
    super(
      causes.length > 0
        ? `No ranging source could be started (${causes.map((cause) => cause.message).join("; ")})`
        : "No ranging source could be started",
    );
    this.name = "NoRangingSourceError";
  }
}

export class PeerSendError extends Error {
  constructor(readonly peerId: string, readonly reason: unknown) {
    super(`Failed to send to ${peerId}: ${reason instanceof Error ? reason.message : String(reason)}`);
    this.name = "PeerSendError";
  }
}

export class MessageDecodeError extends Error {
  constructor(reason: string) {
    super(`Malformed protocol message: ${reason}`);
    this.name = "MessageDecodeError";
  }
}

export class UnknownPeerError extends Error {
  constructor(readonly peerId: string) {
    super(`Unknown peer ${peerId}`);
    this.name = "UnknownPeerError";
  }
}

export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IllegalStateError";
  }
}
