import {
  PHYSICAL_FIELDS,
  type DataFormat,
  type PhysicalField,
  type PhysicalValues,
  type SensorType,
} from "../types";

/** Fields recovered from one payload, before the envelope is attached. */
export interface DecodedPayload {
  format: DataFormat;
  sensorType: SensorType;
  values: PhysicalValues;
  mac?: string;
  measurementSequence?: number;
  luminosity?: number;
}

export interface FormatDecoder {
  format: DataFormat;
  minLength: number;
  decode(payload: Uint8Array): DecodedPayload;
}

export function presentValues(
  values: Partial<Record<PhysicalField, number | undefined>>
): PhysicalValues {
  const out: PhysicalValues = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && isPhysicalField(key)) out[key] = value;
  }
  return out;
}

function isPhysicalField(key: string): key is PhysicalField {
  return Object.hasOwn(PHYSICAL_FIELDS, key);
}
