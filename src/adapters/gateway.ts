import { z } from "zod";
import { ReadingValidationError } from "../common/errors";
import { toEpochSeconds } from "../common/time";
import { describeIssues } from "../common/validation";
import {
  FORMAT_SENSOR_TYPES,
  fieldBelongsTo,
  formatFromCode,
  normalizeMac,
  type CanonicalReading,
  type PhysicalField,
} from "../types";

const optionalNumber = z.number().finite().nullish();

const tagSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  dataFormat: z.number().int(),
  measurementSequenceNumber: z.number().int().nullish(),
  rssi: optionalNumber,
  temperature: optionalNumber,
  humidity: optionalNumber,
  pressure: optionalNumber,
  CO2: optionalNumber,
  VOC: optionalNumber,
  NOx: optionalNumber,
  "PM1.0": optionalNumber,
  "PM2.5": optionalNumber,
  "PM4.0": optionalNumber,
  "PM10.0": optionalNumber,
  accelX: optionalNumber,
  accelY: optionalNumber,
  accelZ: optionalNumber,
  movementCounter: optionalNumber,
  voltage: optionalNumber,
  txPower: optionalNumber,
});

export const gatewayHistorySchema = z.object({
  data: z.object({
    gw_mac: z.string().optional(),
    tags: z.record(z.string(), z.unknown()).default({}),
  }),
});

type GatewayTag = z.infer<typeof tagSchema>;

// gateway JSON key -> canonical field
const FIELD_MAP: [keyof GatewayTag, PhysicalField][] = [
  ["temperature", "temperature"],
  ["humidity", "humidity"],
  ["pressure", "pressure"],
  ["rssi", "rssi"],
  ["CO2", "co2"],
  ["VOC", "voc"],
  ["NOx", "nox"],
  ["PM1.0", "pm1_0"],
  ["PM2.5", "pm2_5"],
  ["PM4.0", "pm4_0"],
  ["PM10.0", "pm10_0"],
  ["accelX", "accelerationX"],
  ["accelY", "accelerationY"],
  ["accelZ", "accelerationZ"],
  ["movementCounter", "movementCounter"],
  ["voltage", "batteryVoltage"],
  ["txPower", "txPower"],
];

export interface SkippedRecord {
  mac: string;
  reason: string;
}

export interface GatewayParseResult {
  gatewayMac?: string;
  readings: CanonicalReading[];
  skipped: SkippedRecord[];
}

/**
 * Normalises a gateway `/history` response. The gateway has already
 * decoded the broadcasts, so values are copied as-is; fields that do not
 * belong to the record's sensor type are dropped.
 */
export function parseGatewayHistory(body: unknown): GatewayParseResult {
  const envelope = gatewayHistorySchema.safeParse(body);
  if (!envelope.success) {
    throw new ReadingValidationError(`Gateway history is malformed: ${describeIssues(envelope.error)}`);
  }
  const parsed = envelope.data;
  const result: GatewayParseResult = {
    gatewayMac: parsed.data.gw_mac,
    readings: [],
    skipped: [],
  };

  for (const [mac, raw] of Object.entries(parsed.data.tags)) {
    const tag = tagSchema.safeParse(raw);
    if (!tag.success) {
      result.skipped.push({ mac, reason: tag.error.issues[0]?.message ?? "invalid record" });
      continue;
    }
    const format = formatFromCode(tag.data.dataFormat);
    if (!format) {
      result.skipped.push({ mac, reason: `unsupported data format ${tag.data.dataFormat}` });
      continue;
    }
    const sensorType = FORMAT_SENSOR_TYPES[format];
    const reading: CanonicalReading = {
      deviceId: normalizeMac(mac),
      timestamp: toEpochSeconds(tag.data.timestamp),
      sensorType,
      format,
    };
    for (const [key, fieldName] of FIELD_MAP) {
      const value = tag.data[key];
      if (typeof value === "number" && fieldBelongsTo(fieldName, sensorType)) {
        reading[fieldName] = value;
      }
    }
    if (typeof tag.data.measurementSequenceNumber === "number") {
      reading.measurementSequence = tag.data.measurementSequenceNumber;
    }
    result.readings.push(reading);
  }
  return result;
}
