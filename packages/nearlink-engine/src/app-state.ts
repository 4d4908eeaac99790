import type { AppState, EngineEvent } from "@nearlink/contracts";
import { IllegalStateError } from "./errors.js";
import type { EngineLogger } from "./logger.js";

const LEGAL_TRANSITIONS: Record<AppState, readonly AppState[]> = {
  idle: ["discovering"],
  discovering: ["connected", "idle"],
  connected: ["transmitting", "idle"],
  transmitting: ["connected"],
  error: ["idle"],
};

export function isLegalTransition(from: AppState, to: AppState): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

/**
 * Process-wide mode. `transition` follows the legal table; the error state is
 * entered only through `fail`, which is refused while a paired peer is still
 * connected.
 */
export class ApplicationStateMachine {
  private current: AppState = "idle";
  private message: string | undefined;

  constructor(
    private readonly logger: EngineLogger,
    private readonly emit: (event: EngineEvent) => void,
    private readonly canEnterError: () => boolean = () => true,
  ) {}

  get state(): AppState {
    return this.current;
  }

  get errorMessage(): string | undefined {
    return this.message;
  }

  transition(to: AppState): boolean {
    const from = this.current;
    if (to === "error" || !isLegalTransition(from, to)) {
      this.logger.warn({ from, to }, "illegal state transition ignored");
      return false;
    }
    if (to === "discovering") {
      this.message = undefined;
    }
    this.current = to;
    this.logger.info({ from, to }, "state changed");
    this.emit({ type: "state.changed", from, to, errorMessage: this.message });
    return true;
  }

  fail(message: string, subsystem = "engine"): boolean {
    const trimmed = message.trim();
    if (trimmed.length === 0) {
      throw new IllegalStateError("Entering the error state requires a message");
    }
    if (!this.canEnterError()) {
      this.logger.warn({ subsystem, message: trimmed }, "failure kept as banner while a paired peer is connected");
      this.emit({ type: "error.banner", subsystem, message: trimmed });
      return false;
    }

    const from = this.current;
    this.current = "error";
    this.message = trimmed;
    this.logger.error({ from, subsystem, message: trimmed }, "entered error state");
    this.emit({ type: "state.changed", from, to: "error", errorMessage: trimmed });
    return true;
  }
}
