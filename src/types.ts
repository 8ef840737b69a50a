export type SensorType = "tag" | "air";

export type DataFormat = "RAWv1" | "RAWv2" | "Format6" | "ExtendedV1";

// Wire code carried in the first payload byte
export const FORMAT_CODES: Record<DataFormat, number> = {
  RAWv1: 0x03,
  RAWv2: 0x05,
  Format6: 0x06,
  ExtendedV1: 0xe1,
};

export const FORMAT_SENSOR_TYPES: Record<DataFormat, SensorType> = {
  RAWv1: "tag",
  RAWv2: "tag",
  Format6: "air",
  ExtendedV1: "air",
};

export function formatFromCode(code: number): DataFormat | null {
  for (const [format, c] of Object.entries(FORMAT_CODES)) {
    if (c === code && isDataFormat(format)) return format;
  }
  return null;
}

export function isDataFormat(value: string): value is DataFormat {
  return Object.hasOwn(FORMAT_CODES, value);
}

/** Which sensor family a physical field belongs to. */
export type FieldScope = "shared" | SensorType;

export const PHYSICAL_FIELDS = {
  temperature: { scope: "shared", column: "temperature", sqlType: "double" },
  humidity: { scope: "shared", column: "humidity", sqlType: "double" },
  pressure: { scope: "shared", column: "pressure", sqlType: "double" },
  rssi: { scope: "shared", column: "rssi", sqlType: "integer" },
  accelerationX: { scope: "tag", column: "acceleration_x", sqlType: "double" },
  accelerationY: { scope: "tag", column: "acceleration_y", sqlType: "double" },
  accelerationZ: { scope: "tag", column: "acceleration_z", sqlType: "double" },
  movementCounter: { scope: "tag", column: "movement_counter", sqlType: "integer" },
  batteryVoltage: { scope: "tag", column: "battery_voltage", sqlType: "double" },
  txPower: { scope: "tag", column: "tx_power", sqlType: "integer" },
  co2: { scope: "air", column: "co2", sqlType: "integer" },
  pm1_0: { scope: "air", column: "pm_1_0", sqlType: "double" },
  pm2_5: { scope: "air", column: "pm_2_5", sqlType: "double" },
  pm4_0: { scope: "air", column: "pm_4_0", sqlType: "double" },
  pm10_0: { scope: "air", column: "pm_10_0", sqlType: "double" },
  voc: { scope: "air", column: "voc", sqlType: "integer" },
  nox: { scope: "air", column: "nox", sqlType: "integer" },
} as const satisfies Record<
  string,
  { scope: FieldScope; column: string; sqlType: "double" | "integer" }
>;

export type PhysicalField = keyof typeof PHYSICAL_FIELDS;

export const PHYSICAL_FIELD_NAMES = Object.keys(PHYSICAL_FIELDS).filter(
  (name): name is PhysicalField => Object.hasOwn(PHYSICAL_FIELDS, name)
);

export function fieldBelongsTo(field: PhysicalField, type: SensorType): boolean {
  const scope: FieldScope = PHYSICAL_FIELDS[field].scope;
  return scope === "shared" || scope === type;
}

export type PhysicalValues = Partial<Record<PhysicalField, number>>;

/**
 * One sensor sample, independent of the transport or wire format that
 * produced it. A field that was absent at the source is left unset.
 */
export interface CanonicalReading extends PhysicalValues {
  deviceId: string;
  timestamp: number; // epoch seconds
  sensorType: SensorType;
  format: DataFormat;
  measurementSequence?: number;
  luminosity?: number; // decoded, not persisted
}

export interface Device {
  mac: string;
  sensorType: SensorType;
  nickname: string;
  description?: string;
  bleUuid?: string;
  createdAt: number; // epoch seconds
}

export interface StoredPoint extends PhysicalValues {
  deviceId: string;
  timestamp: number;
  format: DataFormat;
}

export type InsertOutcome = { status: "inserted" } | { status: "duplicate" };

export interface FieldAggregate {
  mean: number;
  count: number;
}

export interface BucketPoint {
  start: number; // epoch-aligned bucket edge, seconds
  count: number;
  fields: Partial<Record<PhysicalField, FieldAggregate>>;
}

export function normalizeMac(mac: string): string {
  return mac.trim().toUpperCase();
}
