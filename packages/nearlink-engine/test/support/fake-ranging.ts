import type { ProviderType } from "@nearlink/contracts";
import type { RangingListener, RangingSource } from "../../src/ranging.js";

export class FakeRangingSource implements RangingSource {
  available = true;
  startError: Error | undefined;
  listener: RangingListener | undefined;
  readonly configured: Array<{ peerId: string; token: string }> = [];
  starts = 0;
  stops = 0;

  constructor(
    readonly kind: ProviderType,
    private readonly token?: string,
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  async start(listener: RangingListener): Promise<void> {
    this.starts += 1;
    if (this.startError) {
      throw this.startError;
    }
    this.listener = listener;
    if (this.token) {
      listener.localToken(this.token);
    }
  }

  stop(): void {
    this.stops += 1;
    this.listener = undefined;
  }

  configurePeer(peerId: string, token: string): void {
    this.configured.push({ peerId, token });
  }

  emitSample(peerId: string, value: number): void {
    this.listener?.sample(peerId, value);
  }

  invalidate(peerId: string | undefined, reason: string): void {
    this.listener?.invalidated(peerId, reason);
  }
}
