import type { DuckDBValue } from "@duckdb/node-api";
import {
  PHYSICAL_FIELDS,
  PHYSICAL_FIELD_NAMES,
  isDataFormat,
  type BucketPoint,
  type Device,
  type PhysicalField,
  type PhysicalValues,
  type SensorType,
  type StoredPoint,
} from "../types";
import type { SerialConnection, StatementParams } from "./connection";

type Params = StatementParams;
type Row = Record<string, DuckDBValue>;

// DuckDB hands back BIGINT and HUGEINT columns as bigint
function toNum(val: DuckDBValue): number | undefined {
  if (val === null || val === undefined) return undefined;
  if (typeof val === "number") return val;
  if (typeof val === "bigint") return Number(val);
  return undefined;
}

function toStr(val: DuckDBValue): string | undefined {
  if (val === null || val === undefined) return undefined;
  return String(val);
}

function toSensorType(val: DuckDBValue): SensorType {
  const s = String(val);
  if (s === "tag" || s === "air") return s;
  throw new Error(`Unexpected sensor_type in devices table: ${s}`);
}

function inList(prefix: string, values: string[], params: Params): string {
  return values
    .map((v, i) => {
      params[`${prefix}${i}`] = v;
      return `$${prefix}${i}`;
    })
    .join(", ");
}

export interface FieldStats {
  min: number;
  max: number;
  mean: number;
  count: number;
}

export interface DeviceFieldStats {
  deviceId: string;
  count: number;
  first: number;
  last: number;
  fields: Partial<Record<PhysicalField, FieldStats>>;
}

export interface Gap {
  deviceId: string;
  start: number;
  end: number;
}

export interface RangeFilter {
  start?: number;
  end?: number;
  deviceIds?: string[];
}

function whereClause(filter: RangeFilter, params: Params): string {
  const conditions: string[] = [];
  if (filter.start !== undefined) {
    conditions.push("ts >= $start");
    params.start = BigInt(filter.start);
  }
  if (filter.end !== undefined) {
    conditions.push("ts <= $end");
    params.end = BigInt(filter.end);
  }
  if (filter.deviceIds) {
    // an empty id list matches nothing
    conditions.push(
      filter.deviceIds.length
        ? `device_id in (${inList("d", filter.deviceIds, params)})`
        : "false"
    );
  }
  return conditions.length ? `where ${conditions.join(" and ")}` : "";
}

export class DeviceRepository {
  constructor(private conn: SerialConnection) {}

  /** Inserts unless the MAC is already known; true when this call created the row. */
  async insertIfAbsent(device: Device): Promise<boolean> {
    const reader = await this.conn.runAndReadAll(
      `insert into devices(mac, sensor_type, nickname, description, ble_uuid, created_at)
       values($mac, $sensor_type, $nickname, $description, $ble_uuid, $created_at)
       on conflict(mac) do nothing
       returning mac`,
      {
        mac: device.mac,
        sensor_type: device.sensorType,
        nickname: device.nickname,
        description: device.description ?? null,
        ble_uuid: device.bleUuid ?? null,
        created_at: BigInt(device.createdAt),
      }
    );
    return reader.getRowObjects().length > 0;
  }

  async get(mac: string): Promise<Device | null> {
    const reader = await this.conn.runAndReadAll(
      `select * from devices where mac = $mac`,
      { mac }
    );
    const rows = reader.getRowObjects();
    return rows.length ? this.toDevice(rows[0]) : null;
  }

  async findByNickname(nickname: string): Promise<Device | null> {
    const reader = await this.conn.runAndReadAll(
      `select * from devices where lower(nickname) = lower($nickname)`,
      { nickname }
    );
    const rows = reader.getRowObjects();
    return rows.length ? this.toDevice(rows[0]) : null;
  }

  async list(): Promise<Device[]> {
    const reader = await this.conn.runAndReadAll(
      `select * from devices order by sensor_type, created_at, nickname`
    );
    return reader.getRowObjects().map((r) => this.toDevice(r));
  }

  async update(
    mac: string,
    changes: { nickname?: string; description?: string; bleUuid?: string }
  ): Promise<void> {
    const sets: string[] = [];
    const params: Params = { mac };
    if (changes.nickname !== undefined) {
      sets.push("nickname = $nickname");
      params.nickname = changes.nickname;
    }
    if (changes.description !== undefined) {
      sets.push("description = $description");
      params.description = changes.description;
    }
    if (changes.bleUuid !== undefined) {
      sets.push("ble_uuid = $ble_uuid");
      params.ble_uuid = changes.bleUuid;
    }
    if (!sets.length) return;
    await this.conn.run(`update devices set ${sets.join(", ")} where mac = $mac`, params);
  }

  private toDevice(r: Row): Device {
    const device: Device = {
      mac: String(r.mac),
      sensorType: toSensorType(r.sensor_type),
      nickname: String(r.nickname),
      createdAt: toNum(r.created_at) ?? 0,
    };
    const description = toStr(r.description);
    if (description) device.description = description;
    const bleUuid = toStr(r.ble_uuid);
    if (bleUuid) device.bleUuid = bleUuid;
    return device;
  }
}

const FIELD_COLUMNS = PHYSICAL_FIELD_NAMES.map((name) => ({
  name,
  column: PHYSICAL_FIELDS[name].column,
}));

export class ReadingRepository {
  constructor(private conn: SerialConnection) {}

  /**
   * Compare-and-insert on (device_id, ts). Returns false when a row with
   * that key already exists; the existing row is left untouched.
   */
  async insert(point: StoredPoint): Promise<boolean> {
    const params: Params = {
      device_id: point.deviceId,
      ts: BigInt(point.timestamp),
      format: point.format,
    };
    for (const { name, column } of FIELD_COLUMNS) {
      params[column] = point[name] ?? null;
    }
    const columns = ["device_id", "ts", "format", ...FIELD_COLUMNS.map((f) => f.column)];
    const reader = await this.conn.runAndReadAll(
      `insert into readings(${columns.join(", ")})
       values(${columns.map((c) => `$${c}`).join(", ")})
       on conflict(device_id, ts) do nothing
       returning device_id`,
      params
    );
    return reader.getRowObjects().length > 0;
  }

  async range(filter: RangeFilter, limit?: number): Promise<StoredPoint[]> {
    const params: Params = {};
    let sql = `select * from readings ${whereClause(filter, params)} order by device_id, ts`;
    if (limit !== undefined) {
      sql += ` limit $limit`;
      params.limit = BigInt(limit);
    }
    const reader = await this.conn.runAndReadAll(sql, params);
    return reader.getRowObjects().map((r) => this.toPoint(r));
  }

  /**
   * Epoch-aligned buckets of `width` seconds, one group per device and
   * bucket. Groups without rows never appear; per-field means skip nulls.
   */
  async buckets(
    filter: RangeFilter,
    width: number
  ): Promise<{ deviceId: string; bucket: BucketPoint }[]> {
    if (!Number.isInteger(width) || width <= 0) {
      throw new Error(`Bucket width must be a positive integer, got ${width}`);
    }
    const params: Params = {};
    const where = whereClause(filter, params);
    const aggregates = FIELD_COLUMNS.map(
      ({ column }) => `avg(${column}) as avg_${column}, count(${column}) as n_${column}`
    ).join(",\n        ");
    const reader = await this.conn.runAndReadAll(
      `select device_id, (ts // ${width}) * ${width} as bucket_start, count(*) as n,
        ${aggregates}
       from readings ${where}
       group by device_id, bucket_start
       order by device_id, bucket_start`,
      params
    );
    return reader.getRowObjects().map((r) => {
      const bucket: BucketPoint = {
        start: toNum(r.bucket_start) ?? 0,
        count: toNum(r.n) ?? 0,
        fields: {},
      };
      for (const { name, column } of FIELD_COLUMNS) {
        const count = toNum(r[`n_${column}`]) ?? 0;
        const mean = toNum(r[`avg_${column}`]);
        if (count > 0 && mean !== undefined) bucket.fields[name] = { mean, count };
      }
      return { deviceId: String(r.device_id), bucket };
    });
  }

  /** min/max/mean/count per field and device over the filtered rows. */
  async fieldStats(filter: RangeFilter): Promise<DeviceFieldStats[]> {
    const params: Params = {};
    const stats = FIELD_COLUMNS.map(
      ({ column }) =>
        `min(${column}) as min_${column}, max(${column}) as max_${column}, ` +
        `avg(${column}) as avg_${column}, count(${column}) as n_${column}`
    ).join(",\n        ");
    const reader = await this.conn.runAndReadAll(
      `select device_id, count(*) as n, min(ts) as first_ts, max(ts) as last_ts,
        ${stats}
       from readings ${whereClause(filter, params)}
       group by device_id
       order by device_id`,
      params
    );
    return reader.getRowObjects().map((r) => {
      const result: DeviceFieldStats = {
        deviceId: String(r.device_id),
        count: toNum(r.n) ?? 0,
        first: toNum(r.first_ts) ?? 0,
        last: toNum(r.last_ts) ?? 0,
        fields: {},
      };
      for (const { name, column } of FIELD_COLUMNS) {
        const count = toNum(r[`n_${column}`]) ?? 0;
        const min = toNum(r[`min_${column}`]);
        const max = toNum(r[`max_${column}`]);
        const mean = toNum(r[`avg_${column}`]);
        if (count > 0 && min !== undefined && max !== undefined && mean !== undefined) {
          result.fields[name] = { min, max, mean, count };
        }
      }
      return result;
    });
  }

  /** Consecutive readings of one device more than `threshold` seconds apart. */
  async gaps(filter: RangeFilter, threshold: number): Promise<Gap[]> {
    const params: Params = { threshold: BigInt(threshold) };
    const reader = await this.conn.runAndReadAll(
      `select device_id, prev_ts, ts from (
         select device_id, ts, lag(ts) over (partition by device_id order by ts) as prev_ts
         from readings ${whereClause(filter, params)}
       ) where prev_ts is not null and ts - prev_ts > $threshold
       order by device_id, ts`,
      params
    );
    return reader.getRowObjects().map((r) => ({
      deviceId: String(r.device_id),
      start: toNum(r.prev_ts) ?? 0,
      end: toNum(r.ts) ?? 0,
    }));
  }

  async latest(deviceId?: string): Promise<StoredPoint | null> {
    const params: Params = {};
    const where = whereClause(deviceId ? { deviceIds: [deviceId] } : {}, params);
    const reader = await this.conn.runAndReadAll(
      `select * from readings ${where} order by ts desc, device_id limit 1`,
      params
    );
    const rows = reader.getRowObjects();
    return rows.length ? this.toPoint(rows[0]) : null;
  }

  async count(filter: RangeFilter): Promise<number> {
    const params: Params = {};
    const reader = await this.conn.runAndReadAll(
      `select count(*) as n from readings ${whereClause(filter, params)}`,
      params
    );
    return toNum(reader.getRowObjects()[0].n) ?? 0;
  }

  async deviceIds(): Promise<string[]> {
    const reader = await this.conn.runAndReadAll(
      `select distinct device_id from readings order by device_id`
    );
    return reader.getRowObjects().map((r) => String(r.device_id));
  }

  async dataRange(): Promise<{ first: number; last: number } | null> {
    const reader = await this.conn.runAndReadAll(
      `select min(ts) as first_ts, max(ts) as last_ts from readings`
    );
    const row = reader.getRowObjects()[0];
    const first = toNum(row.first_ts);
    const last = toNum(row.last_ts);
    if (first === undefined || last === undefined) return null;
    return { first, last };
  }

  private toPoint(r: Row): StoredPoint {
    const format = String(r.format);
    if (!isDataFormat(format)) {
      throw new Error(`Unexpected format in readings table: ${format}`);
    }
    const values: PhysicalValues = {};
    for (const { name, column } of FIELD_COLUMNS) {
      const v = toNum(r[column]);
      if (v !== undefined) values[name] = v;
    }
    return {
      deviceId: String(r.device_id),
      timestamp: toNum(r.ts) ?? 0,
      format,
      ...values,
    };
  }
}
