import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { PairedDeviceListSchema, type PairedDevice } from "@nearlink/contracts";
import type { EngineLogger, PairedDeviceStore } from "@nearlink/engine";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Paired devices as one JSON array on disk. Writes go to a sibling temp file
 * that is renamed over the target, so a reader sees either the old or the new
 * list.
 */
export class JsonFilePairedDeviceStore implements PairedDeviceStore {
  private writeSeq = 0;

  constructor(
    private readonly filePath: string,
    private readonly logger: EngineLogger,
  ) {}

  async loadPairedDevices(): Promise<PairedDevice[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: error, path: this.filePath }, "paired devices file is not valid JSON, starting empty");
      return [];
    }

    const parsed = PairedDeviceListSchema.safeParse(parsedJson);
    if (!parsed.success) {
      this.logger.warn(
        { path: this.filePath, issues: parsed.error.issues.length },
        "paired devices file failed validation, starting empty",
      );
      return [];
    }
    return parsed.data;
  }

  async savePairedDevices(devices: PairedDevice[]): Promise<void> {
    this.writeSeq += 1;
    const tempPath = `${this.filePath}.${process.pid}.${this.writeSeq}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(devices, null, 2)}\n`, "utf8");
    await rename(tempPath, this.filePath);
    this.logger.debug({ path: this.filePath, count: devices.length }, "paired devices saved");
  }
}
