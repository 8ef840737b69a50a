import { z } from "zod";
import { ReadingValidationError } from "../common/errors";
import { timestampOr } from "../common/time";
import { describeIssues } from "../common/validation";
import { decodeAdvertisement } from "../decoder";
import { normalizeMac, type CanonicalReading } from "../types";

const measurementSchema = z.object({
  timestamp: z.union([z.number(), z.string()]).nullish(),
  rssi: z.number().int().nullish(),
  data: z.string().nullish(),
});

export const cloudHistorySchema = z.object({
  data: z.object({
    sensor: z.string().optional(),
    measurements: z.array(z.unknown()).default([]),
  }),
});

export interface SkippedMeasurement {
  index: number;
  reason: string;
}

export interface CloudParseResult {
  readings: CanonicalReading[];
  skipped: SkippedMeasurement[];
}

/**
 * Normalises a cloud history response for one sensor. Each measurement
 * carries the raw broadcast in hex, decoded here with the sensor's MAC
 * as device id. Measurements without a timestamp take `receivedAt`.
 */
export function parseCloudHistory(
  body: unknown,
  sensorMac: string,
  receivedAt: Date = new Date()
): CloudParseResult {
  const envelope = cloudHistorySchema.safeParse(body);
  if (!envelope.success) {
    throw new ReadingValidationError(`Cloud history is malformed: ${describeIssues(envelope.error)}`);
  }
  const deviceId = normalizeMac(sensorMac);
  const result: CloudParseResult = { readings: [], skipped: [] };

  envelope.data.data.measurements.forEach((raw, index) => {
    const measurement = measurementSchema.safeParse(raw);
    if (!measurement.success) {
      result.skipped.push({ index, reason: describeIssues(measurement.error) });
      return;
    }
    const { data, rssi, timestamp } = measurement.data;
    if (!data) {
      result.skipped.push({ index, reason: "measurement has no raw data" });
      return;
    }
    const decoded = decodeAdvertisement(data, {
      timestamp: timestampOr(timestamp, receivedAt),
      deviceId,
      rssi: rssi ?? undefined,
    });
    if (!decoded.ok) {
      result.skipped.push({ index, reason: `${decoded.error.code}: ${decoded.error.message}` });
      return;
    }
    result.readings.push(decoded.reading);
  });
  return result;
}
