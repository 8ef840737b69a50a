import { z } from "zod";
import type { DecodeError } from "../common/errors";
import { timestampOr } from "../common/time";
import { decodeAdvertisement } from "../decoder";
import type { CanonicalReading } from "../types";

export const mqttMessageSchema = z.object({
  gw_mac: z.string().optional(),
  rssi: z.number().int().optional(),
  data: z.string().min(1),
  ts: z.union([z.number(), z.string()]).optional(),
  coordinates: z.string().optional(),
});

export type MqttMessageResult =
  | { ok: true; reading: CanonicalReading }
  | { ok: false; reason: string; error?: DecodeError };

/**
 * Turns one gateway MQTT message (`{ gw_mac, rssi, data, ts }`) into a
 * reading. `data` is the raw advertisement in hex; `ts` is epoch seconds
 * or ISO-8601 and falls back to the receive time. `deviceId` (usually
 * taken from the topic) wins over a MAC carried in the payload.
 */
export function parseMqttMessage(
  payload: Buffer | string,
  receivedAt: Date = new Date(),
  deviceId?: string
): MqttMessageResult {
  let json: unknown;
  try {
    json = JSON.parse(payload.toString());
  } catch {
    return { ok: false, reason: "payload is not JSON" };
  }
  const message = mqttMessageSchema.safeParse(json);
  if (!message.success) {
    return { ok: false, reason: message.error.issues[0]?.message ?? "invalid message" };
  }

  const decoded = decodeAdvertisement(message.data.data, {
    timestamp: timestampOr(message.data.ts, receivedAt),
    rssi: message.data.rssi,
    deviceId,
  });
  if (!decoded.ok) {
    return { ok: false, reason: decoded.error.message, error: decoded.error };
  }
  return { ok: true, reading: decoded.reading };
}

/** Device id from a `ruuvi/<gateway>/<device>` style topic, if present. */
export function deviceFromTopic(topic: string): string | undefined {
  const last = topic.split("/").pop();
  return last && /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/.test(last) ? last : undefined;
}
