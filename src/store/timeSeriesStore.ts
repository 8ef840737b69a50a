import type { Logger } from "../common/logger";
import {
  InvalidTimeRangeError,
  ReadingValidationError,
  SensorVaultError,
  UnknownDeviceError,
} from "../common/errors";
import { SerialQueue } from "../common/serialQueue";
import { guardStorage } from "../common/storage";
import type {
  DeviceFieldStats,
  RangeFilter,
  ReadingRepository,
} from "../db/repositories";
import type { DeviceRegistry } from "../registry/deviceRegistry";
import {
  FORMAT_SENSOR_TYPES,
  PHYSICAL_FIELD_NAMES,
  fieldBelongsTo,
  normalizeMac,
  type BucketPoint,
  type CanonicalReading,
  type Device,
  type InsertOutcome,
  type SensorType,
  type StoredPoint,
} from "../types";
import {
  DEFAULT_POINT_BUDGET,
  RESOLUTION_SECONDS,
  selectResolution,
  type RequestedResolution,
  type Resolution,
} from "./resolution";

export interface TimeSeriesStoreOptions {
  readings: ReadingRepository;
  registry: DeviceRegistry;
  logger: Logger;
  writeQueue?: SerialQueue;
  autoPointBudget?: number;
  gapThresholdMinutes?: number;
}

export interface QueryRequest {
  start: number;
  end: number;
  /** MAC or nickname; omitted means every device with data in range. */
  device?: string;
  resolution?: RequestedResolution;
}

export interface SeriesInfo {
  deviceId: string;
  nickname?: string;
  sensorType?: SensorType;
}

export interface RawSeries extends SeriesInfo {
  points: StoredPoint[];
}

export interface BucketSeries extends SeriesInfo {
  points: BucketPoint[];
}

interface QueryResultBase {
  start: number;
  end: number;
  resolution: RequestedResolution;
}

export type QueryResult =
  | (QueryResultBase & { mode: "raw"; resolutionUsed: "raw"; series: RawSeries[] })
  | (QueryResultBase & {
      mode: "bucketed";
      resolutionUsed: Exclude<Resolution, "raw">;
      bucketSeconds: number;
      series: BucketSeries[];
    });

export interface BatchOutcome {
  inserted: number;
  duplicates: number;
  rejected: { reading: CanonicalReading; error: SensorVaultError }[];
}

export interface DeviceSummary extends SeriesInfo {
  readingCount: number;
  first: number;
  last: number;
  fields: DeviceFieldStats["fields"];
  gaps: { start: number; end: number; minutes: number }[];
}

/** Throws ReadingValidationError unless the reading is well formed for its type. */
export function validateReading(reading: CanonicalReading): void {
  if (!reading.deviceId.trim()) {
    throw new ReadingValidationError("Reading has no device id");
  }
  if (!Number.isInteger(reading.timestamp) || reading.timestamp < 0) {
    throw new ReadingValidationError(
      `Timestamp must be whole epoch seconds, got ${reading.timestamp}`
    );
  }
  if (FORMAT_SENSOR_TYPES[reading.format] !== reading.sensorType) {
    throw new ReadingValidationError(
      `${reading.format} readings come from ${FORMAT_SENSOR_TYPES[reading.format]} sensors, not ${reading.sensorType}`
    );
  }
  for (const name of PHYSICAL_FIELD_NAMES) {
    const value = reading[name];
    if (value === undefined) continue;
    if (!Number.isFinite(value)) {
      throw new ReadingValidationError(`${name} is not a finite number`);
    }
    if (!fieldBelongsTo(name, reading.sensorType)) {
      throw new ReadingValidationError(`${name} is not a ${reading.sensorType} field`);
    }
  }
}

export function toStoredPoint(reading: CanonicalReading): StoredPoint {
  const point: StoredPoint = {
    deviceId: normalizeMac(reading.deviceId),
    timestamp: reading.timestamp,
    format: reading.format,
  };
  for (const name of PHYSICAL_FIELD_NAMES) {
    const value = reading[name];
    if (value !== undefined) point[name] = value;
  }
  return point;
}

/**
 * Append-only reading store keyed on (device, timestamp). The first
 * reading for a key wins; later ones report `duplicate`.
 */
export class TimeSeriesStore {
  private readonly readings: ReadingRepository;
  private readonly registry: DeviceRegistry;
  private readonly logger: Logger;
  private readonly queue: SerialQueue;
  private readonly budget: number;
  private readonly gapThresholdSeconds: number;

  constructor(options: TimeSeriesStoreOptions) {
    this.readings = options.readings;
    this.registry = options.registry;
    this.logger = options.logger;
    this.queue = options.writeQueue ?? new SerialQueue();
    this.budget = options.autoPointBudget ?? DEFAULT_POINT_BUDGET;
    this.gapThresholdSeconds = (options.gapThresholdMinutes ?? 60) * 60;
  }

  /**
   * Registers the device if needed, then inserts the reading. Safe to
   * retry: a repeat of the same key resolves to `duplicate`.
   */
  async insert(reading: CanonicalReading): Promise<InsertOutcome> {
    validateReading(reading);
    const device = await this.registry.resolve(reading.deviceId, reading.sensorType);
    const point = toStoredPoint({ ...reading, deviceId: device.mac });

    const inserted = await this.queue.run(() =>
      guardStorage("insert", () => this.readings.insert(point))
    );
    if (this.logger.isDebugEnabled()) {
      this.logger
        .with()
        .str("device", device.nickname)
        .num("ts", point.timestamp)
        .str("format", point.format)
        .bool("inserted", inserted)
        .logger()
        .debug(inserted ? "Reading stored" : "Duplicate reading skipped");
    }
    return inserted ? { status: "inserted" } : { status: "duplicate" };
  }

  /**
   * Inserts each reading in order. Permanent per-reading errors are
   * collected; a storage failure aborts the batch.
   */
  async insertMany(readings: CanonicalReading[]): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { inserted: 0, duplicates: 0, rejected: [] };
    for (const reading of readings) {
      try {
        const result = await this.insert(reading);
        if (result.status === "inserted") outcome.inserted++;
        else outcome.duplicates++;
      } catch (e) {
        if (e instanceof SensorVaultError && !e.retryable) {
          outcome.rejected.push({ reading, error: e });
          continue;
        }
        throw e;
      }
    }
    if (outcome.rejected.length) {
      this.logger
        .with()
        .num("inserted", outcome.inserted)
        .num("duplicates", outcome.duplicates)
        .array(
          "rejected",
          outcome.rejected.map((r) => `${r.reading.deviceId}: ${r.error.code}`)
        )
        .logger()
        .warn("Batch had rejected readings");
    }
    return outcome;
  }

  /**
   * Readings in [start, end], one series per device, ascending by time.
   * Buckets are aligned to the epoch, not to `start`.
   */
  async query(request: QueryRequest): Promise<QueryResult> {
    const { start, end } = request;
    checkRange(start, end);
    const requested = request.resolution ?? "auto";
    const resolutionUsed = selectResolution(start, end, requested, this.budget);
    const devices = await this.devicesFor(request.device);
    const filter: RangeFilter = { start, end, deviceIds: devices.ids };

    if (resolutionUsed === "raw") {
      const points = await guardStorage("query", () => this.readings.range(filter));
      return {
        start,
        end,
        resolution: requested,
        mode: "raw",
        resolutionUsed,
        series: groupByDevice(points, (p) => p.deviceId, devices.info),
      };
    }

    const bucketSeconds = RESOLUTION_SECONDS[resolutionUsed];
    const rows = await guardStorage("query", () =>
      this.readings.buckets(filter, bucketSeconds)
    );
    return {
      start,
      end,
      resolution: requested,
      mode: "bucketed",
      resolutionUsed,
      bucketSeconds,
      series: groupByDevice(rows, (r) => r.deviceId, devices.info).map((s) => ({
        ...s,
        points: s.points.map((r) => r.bucket),
      })),
    };
  }

  /** Per-device statistics and gaps over raw readings in [start, end]. */
  async summarize(request: Omit<QueryRequest, "resolution">): Promise<DeviceSummary[]> {
    const { start, end } = request;
    checkRange(start, end);
    const devices = await this.devicesFor(request.device);
    const filter: RangeFilter = { start, end, deviceIds: devices.ids };

    const { stats, gaps } = await guardStorage("summarize", async () => ({
      stats: await this.readings.fieldStats(filter),
      gaps: await this.readings.gaps(filter, this.gapThresholdSeconds),
    }));
    return stats.map((s) => ({
      ...describe(s.deviceId, devices.info),
      readingCount: s.count,
      first: s.first,
      last: s.last,
      fields: s.fields,
      gaps: gaps
        .filter((g) => g.deviceId === s.deviceId)
        .map((g) => ({
          start: g.start,
          end: g.end,
          minutes: Math.floor((g.end - g.start) / 60),
        })),
    }));
  }

  async latest(device?: string): Promise<StoredPoint | null> {
    const mac = device ? (await this.requireDevice(device)).mac : undefined;
    return guardStorage("latest", () => this.readings.latest(mac));
  }

  async count(filter: { start?: number; end?: number; device?: string } = {}): Promise<number> {
    checkBound(filter.start, filter.start, filter.end);
    checkBound(filter.end, filter.start, filter.end);
    const deviceIds = filter.device ? [(await this.requireDevice(filter.device)).mac] : undefined;
    return guardStorage("count", () =>
      this.readings.count({ start: filter.start, end: filter.end, deviceIds })
    );
  }

  deviceIds(): Promise<string[]> {
    return guardStorage("device-ids", () => this.readings.deviceIds());
  }

  dataRange(): Promise<{ first: number; last: number } | null> {
    return guardStorage("data-range", () => this.readings.dataRange());
  }

  private async requireDevice(identifier: string): Promise<Device> {
    const device = await this.registry.lookup(identifier);
    if (!device) throw new UnknownDeviceError(identifier);
    return device;
  }

  private async devicesFor(
    identifier: string | undefined
  ): Promise<{ ids?: string[]; info: Map<string, Device> }> {
    if (identifier !== undefined) {
      const device = await this.requireDevice(identifier);
      return { ids: [device.mac], info: new Map([[device.mac, device]]) };
    }
    const all = await this.registry.list();
    return { info: new Map(all.map((d) => [d.mac, d])) };
  }
}

// Bounds are whole epoch seconds, like stored timestamps
function checkBound(value: number | undefined, start?: number, end?: number): void {
  if (value !== undefined && !Number.isInteger(value)) {
    throw new InvalidTimeRangeError(
      start ?? NaN,
      end ?? NaN,
      `Query bounds must be whole epoch seconds, got ${value}`
    );
  }
}

function checkRange(start: number, end: number): void {
  checkBound(start, start, end);
  checkBound(end, start, end);
  if (end < start) throw new InvalidTimeRangeError(start, end);
}

function describe(deviceId: string, info: Map<string, Device>): SeriesInfo {
  const device = info.get(deviceId);
  return device
    ? { deviceId, nickname: device.nickname, sensorType: device.sensorType }
    : { deviceId };
}

// Rows arrive ordered by device then time, so each series stays ascending
function groupByDevice<T>(
  rows: T[],
  deviceOf: (row: T) => string,
  info: Map<string, Device>
): (SeriesInfo & { points: T[] })[] {
  const series = new Map<string, SeriesInfo & { points: T[] }>();
  for (const row of rows) {
    const id = deviceOf(row);
    let entry = series.get(id);
    if (!entry) {
      entry = { ...describe(id, info), points: [] };
      series.set(id, entry);
    }
    entry.points.push(row);
  }
  return Array.from(series.values());
}
