import type { PairedDevice } from "@nearlink/contracts";

/** Whole-list persistence of paired devices; `save` replaces everything. */
export interface PairedDeviceStore {
  loadPairedDevices(): Promise<PairedDevice[]>;
  savePairedDevices(devices: PairedDevice[]): Promise<void>;
}

export class InMemoryPairedDeviceStore implements PairedDeviceStore {
  private devices: PairedDevice[];
  saves = 0;

  constructor(initial: PairedDevice[] = []) {
    this.devices = initial.map((device) => ({ ...device }));
  }

  async loadPairedDevices(): Promise<PairedDevice[]> {
    return this.devices.map((device) => ({ ...device }));
  }

  async savePairedDevices(devices: PairedDevice[]): Promise<void> {
    this.devices = devices.map((device) => ({ ...device }));
    this.saves += 1;
  }
}

/**
 * Serialises writes against a store so that a save issued later can never be
 * overtaken by an earlier one still in flight.
 */
export class PairedDeviceLedger {
  private readonly devices = new Map<string, PairedDevice>();
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly store: PairedDeviceStore) {}

  async load(): Promise<PairedDevice[]> {
    const loaded = await this.store.loadPairedDevices();
    this.devices.clear();
    for (const device of loaded) {
      this.devices.set(device.id, device);
    }
    return this.list();
  }

  list(): PairedDevice[] {
    return Array.from(this.devices.values()).map((device) => ({ ...device }));
  }

  get(id: string): PairedDevice | undefined {
    const device = this.devices.get(id);
    return device ? { ...device } : undefined;
  }

  has(id: string): boolean {
    return this.devices.has(id);
  }

  /** Returns false when the device was already recorded. */
  add(device: PairedDevice): boolean {
    if (this.devices.has(device.id)) {
      return false;
    }
    this.devices.set(device.id, { ...device });
    return true;
  }

  remove(id: string): boolean {
    return this.devices.delete(id);
  }

  touch(id: string, lastConnected: number): boolean {
    const device = this.devices.get(id);
    if (!device) {
      return false;
    }
    device.lastConnected = lastConnected;
    return true;
  }

  rename(id: string, name: string): boolean {
    const device = this.devices.get(id);
    if (!device || device.name === name) {
      return false;
    }
    device.name = name;
    return true;
  }

  /** Queues a whole-list write of the current contents. */
  persist(): Promise<void> {
    const snapshot = this.list();
    const write = this.writes.then(() => this.store.savePairedDevices(snapshot));
    this.writes = write.catch(() => undefined);
    return write;
  }

  flush(): Promise<void> {
    return this.writes;
  }
}
