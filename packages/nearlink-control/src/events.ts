import type { EngineEvent, EventSocketOutbound } from "@nearlink/contracts";
import type { ProximityEngine } from "@nearlink/engine";

export interface EventClient {
  clientId: string;
  send: (message: EventSocketOutbound) => void;
}

/** Fans engine events out to every connected UI socket. */
export class EventFanout {
  private readonly clients = new Set<EventClient>();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly engine: ProximityEngine,
    private readonly now: () => number = Date.now,
  ) {
    this.unsubscribe = engine.subscribe((event) => this.publish(event));
  }

  get size(): number {
    return this.clients.size;
  }

  add(client: EventClient): void {
    this.clients.add(client);
    this.sendSnapshot(client);
  }

  remove(client: EventClient): void {
    this.clients.delete(client);
  }

  sendSnapshot(client: EventClient): void {
    client.send({ type: "events.snapshot", snapshot: this.engine.snapshot(), timestampMs: this.now() });
  }

  close(): void {
    this.unsubscribe();
    this.clients.clear();
  }

  private publish(event: EngineEvent): void {
    const timestampMs = this.now();
    for (const client of this.clients) {
      client.send({ type: "events.engine", event, timestampMs });
    }
  }
}
