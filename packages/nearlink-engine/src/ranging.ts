import type { ProviderType } from "@nearlink/contracts";
import { NoRangingSourceError, RangingUnavailableError } from "./errors.js";
import type { EngineLogger } from "./logger.js";

export interface RangingListener {
  /** Meters for a precise source, dBm for a signal-strength source. */
  sample(peerId: string, value: number): void;
  localToken(token: string): void;
  invalidated(peerId: string | undefined, reason: string): void;
}

export interface RangingSource {
  readonly kind: ProviderType;
  isAvailable(): boolean;
  start(listener: RangingListener): Promise<void>;
  stop(): void;
  /** Begins targeted ranging against the peer holding `token` (base64). */
  configurePeer(peerId: string, token: string): void;
}

export interface RangingSink {
  sample(kind: ProviderType, peerId: string, value: number): void;
  localToken(token: string): void;
  invalidated(kind: ProviderType, peerId: string | undefined, reason: string): void;
}

export interface RangingStartResult {
  active: ProviderType;
  degraded: boolean;
  notice?: string;
}

export interface RangingSources {
  precise?: RangingSource;
  signalStrength?: RangingSource;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class RangingCoordinator {
  private readonly started = new Set<ProviderType>();
  private token: string | undefined;
  private active: ProviderType | undefined;

  constructor(
    private readonly sources: RangingSources,
    private readonly logger: EngineLogger,
  ) {}

  /**
   * Prefers precise ranging and falls back to signal strength. The fallback
   * source also runs alongside a working precise source so peers without a
   * completed token exchange are still ranged.
   */
  async start(sink: RangingSink): Promise<RangingStartResult> {
    if (this.active) {
      return { active: this.active, degraded: this.active !== "precise" };
    }

    const failures: Error[] = [];
    let notice: string | undefined;

    const precise = this.sources.precise;
    if (precise && precise.isAvailable()) {
      try {
        await precise.start(this.listenerFor("precise", sink));
        this.started.add("precise");
      } catch (error) {
        this.token = undefined;
        failures.push(asError(error));
        this.logger.warn({ err: error }, "precise ranging failed to start, falling back to signal strength");
        notice = "Precise ranging could not start; using signal strength with reduced accuracy";
      }
    } else {
      failures.push(new RangingUnavailableError("precise", "not supported on this device"));
      notice = "Precise ranging is not available; using signal strength with reduced accuracy";
    }

    const fallback = this.sources.signalStrength;
    if (fallback && fallback.isAvailable()) {
      try {
        await fallback.start(this.listenerFor("signalStrength", sink));
        this.started.add("signalStrength");
      } catch (error) {
        failures.push(asError(error));
        this.logger.warn({ err: error }, "signal strength ranging failed to start");
      }
    } else {
      failures.push(new RangingUnavailableError("signalStrength", "no signal strength source"));
    }

    if (this.started.has("precise")) {
      this.active = "precise";
      return { active: "precise", degraded: false };
    }
    if (this.started.has("signalStrength")) {
      this.active = "signalStrength";
      return { active: "signalStrength", degraded: true, notice };
    }
    throw new NoRangingSourceError(failures);
  }

  stop(): void {
    for (const kind of this.started) {
      this.sourceFor(kind)?.stop();
    }
    this.started.clear();
    this.token = undefined;
    this.active = undefined;
  }

  get activeProvider(): ProviderType | undefined {
    return this.active;
  }

  isRunning(kind: ProviderType): boolean {
    return this.started.has(kind);
  }

  /** The local ranging token, only while precise ranging runs. */
  get localToken(): string | undefined {
    return this.started.has("precise") ? this.token : undefined;
  }

  configurePeer(peerId: string, token: string): boolean {
    const precise = this.sources.precise;
    if (!precise || !this.started.has("precise")) {
      this.logger.debug({ peerId }, "no precise ranging session to configure");
      return false;
    }
    precise.configurePeer(peerId, token);
    return true;
  }

  private sourceFor(kind: ProviderType): RangingSource | undefined {
    return kind === "precise" ? this.sources.precise : this.sources.signalStrength;
  }

  private listenerFor(kind: ProviderType, sink: RangingSink): RangingListener {
    return {
      sample: (peerId, value) => {
        if (this.started.has(kind)) {
          sink.sample(kind, peerId, value);
        }
      },
      localToken: (token) => {
        if (kind !== "precise") {
          return;
        }
        this.token = token;
        sink.localToken(token);
      },
      invalidated: (peerId, reason) => {
        if (peerId === undefined && this.started.has(kind)) {
          // The whole session of this kind is gone.
          this.started.delete(kind);
          if (kind === "precise") {
            this.token = undefined;
          }
          this.active = this.started.has("precise")
            ? "precise"
            : this.started.has("signalStrength") ? "signalStrength" : undefined;
        }
        sink.invalidated(kind, peerId, reason);
      },
    };
  }
}
