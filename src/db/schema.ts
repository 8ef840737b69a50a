import type { SerialConnection } from "./connection";
import { PHYSICAL_FIELDS } from "../types";

export async function createSchema(connection: SerialConnection): Promise<void> {
  // devices: one row per physical sensor, type fixed at first sight
  await connection.run(`create table if not exists devices (
    mac text primary key,
    sensor_type text not null,
    nickname text not null,
    description text,
    ble_uuid text,
    created_at bigint not null,
    unique(sensor_type, nickname)
  )`);

  const fieldColumns = Object.values(PHYSICAL_FIELDS)
    .map((f) => `${f.column} ${f.sqlType}`)
    .join(",\n    ");

  // readings: (device_id, ts) is the dedup key whatever the transport
  await connection.run(`create table if not exists readings (
    device_id text not null,
    ts bigint not null,
    format text not null,
    ${fieldColumns},
    ingested_at timestamp not null default current_timestamp,
    primary key(device_id, ts)
  )`);

  await connection.run(`create index if not exists idx_readings_ts on readings(ts)`);
}
