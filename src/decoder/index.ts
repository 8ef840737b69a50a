import { DecodeError } from "../common/errors";
import { toEpochSeconds, type TimeInput } from "../common/time";
import {
  FORMAT_CODES,
  formatFromCode,
  normalizeMac,
  type CanonicalReading,
  type DataFormat,
} from "../types";
import { hexToBytes } from "./bytes";
import { extendedV1 } from "./formats/extendedV1";
import { format6 } from "./formats/format6";
import { rawv1 } from "./formats/rawv1";
import { rawv2 } from "./formats/rawv2";
import type { DecodedPayload, FormatDecoder } from "./types";

export type { DecodedPayload, FormatDecoder } from "./types";

// One routine per wire format; a new format is one more entry here.
export const FORMAT_DECODERS: Record<DataFormat, FormatDecoder> = {
  RAWv1: rawv1,
  RAWv2: rawv2,
  Format6: format6,
  ExtendedV1: extendedV1,
};

/** What the transport knows about a payload besides its bytes. */
export interface Envelope {
  timestamp: TimeInput;
  deviceId?: string;
  rssi?: number;
}

export type DecodeResult =
  | { ok: true; reading: CanonicalReading }
  | { ok: false; error: DecodeError };

const MANUFACTURER_DATA = [0xff, 0x99, 0x04];

export function decodePayload(
  raw: Uint8Array,
  formatId: number
): DecodedPayload | DecodeError {
  const format = formatFromCode(formatId);
  if (!format) {
    return new DecodeError(
      "UnsupportedFormat",
      `Unsupported data format 0x${formatId.toString(16)}`
    );
  }
  const decoder = FORMAT_DECODERS[format];
  if (raw.length < decoder.minLength) {
    return new DecodeError(
      "TruncatedPayload",
      `${format} needs ${decoder.minLength} bytes, got ${raw.length}`
    );
  }
  if (raw[0] !== FORMAT_CODES[format]) {
    return new DecodeError(
      "FormatMismatch",
      `Payload starts with 0x${raw[0].toString(16)}, expected ${format}`
    );
  }
  return decoder.decode(raw);
}

/**
 * Decodes one payload (format byte first) into a canonical reading. Pure:
 * the same bytes and envelope always give the same result.
 */
export function decode(raw: Uint8Array, formatId: number, envelope: Envelope): DecodeResult {
  const decoded = decodePayload(raw, formatId);
  if (decoded instanceof DecodeError) return { ok: false, error: decoded };

  const deviceId = envelope.deviceId ?? decoded.mac;
  if (!deviceId) {
    return {
      ok: false,
      error: new DecodeError(
        "MissingDeviceId",
        `${decoded.format} payload carries no MAC and none was supplied`
      ),
    };
  }

  const reading: CanonicalReading = {
    deviceId: normalizeMac(deviceId),
    timestamp: toEpochSeconds(envelope.timestamp),
    sensorType: decoded.sensorType,
    format: decoded.format,
    ...decoded.values,
  };
  if (envelope.rssi !== undefined) reading.rssi = envelope.rssi;
  if (decoded.measurementSequence !== undefined) {
    reading.measurementSequence = decoded.measurementSequence;
  }
  if (decoded.luminosity !== undefined) reading.luminosity = decoded.luminosity;
  return { ok: true, reading };
}

/**
 * Finds the manufacturer block (FF 99 04) in a full advertisement and
 * returns what follows it. A string that already starts with a known
 * format code is taken as the payload itself.
 */
export function extractManufacturerPayload(hex: string): Uint8Array | DecodeError {
  const data = hexToBytes(hex);
  if (!data || data.length === 0) {
    return new DecodeError("InvalidAdvertisement", "Advertisement is not a hex string");
  }
  for (let i = 0; i + MANUFACTURER_DATA.length < data.length; i++) {
    if (MANUFACTURER_DATA.every((b, j) => data[i + j] === b)) {
      return data.subarray(i + MANUFACTURER_DATA.length);
    }
  }
  if (formatFromCode(data[0])) return data;
  return new DecodeError("InvalidAdvertisement", "No sensor payload in advertisement");
}

export function decodeAdvertisement(hex: string, envelope: Envelope): DecodeResult {
  const payload = extractManufacturerPayload(hex);
  if (payload instanceof DecodeError) return { ok: false, error: payload };
  return decode(payload, payload[0], envelope);
}
