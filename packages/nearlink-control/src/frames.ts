import type { z } from "zod";

export type FrameResult<T> =
  | { ok: true; value: T }
  | { ok: false; code: "invalid_frame" | "invalid_json" | "invalid_message"; message: string };

/** Text of a websocket frame, or undefined for frame types we do not accept. */
export function frameText(raw: unknown): string | undefined {
  if (typeof raw === "string") {
    return raw;
  }
  if (raw instanceof Uint8Array) {
    return Buffer.from(raw).toString("utf8");
  }
  if (Array.isArray(raw) && raw.every((chunk) => chunk instanceof Uint8Array)) {
    return Buffer.concat(raw.map((chunk: Uint8Array) => Buffer.from(chunk))).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return undefined;
}

export function decodeFrame<T extends z.ZodTypeAny>(raw: unknown, schema: T): FrameResult<z.infer<T>> {
  const payload = frameText(raw);
  if (payload === undefined) {
    return { ok: false, code: "invalid_frame", message: "Inbound socket frame type is not supported" };
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(payload);
  } catch {
    return { ok: false, code: "invalid_json", message: "Inbound socket payload is not valid JSON" };
  }

  const parsed = schema.safeParse(parsedJson);
  if (!parsed.success) {
    return { ok: false, code: "invalid_message", message: "Inbound socket message failed validation" };
  }
  return { ok: true, value: parsed.data };
}
