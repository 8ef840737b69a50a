import { LogLevel, SensorLogger } from "../src/common/logger";
import { SerialQueue } from "../src/common/serialQueue";
import { openDatabase, type Database } from "../src/db/connection";
import { DeviceRepository, ReadingRepository } from "../src/db/repositories";
import { createSchema } from "../src/db/schema";
import { DeviceRegistry } from "../src/registry/deviceRegistry";
import { TimeSeriesStore } from "../src/store/timeSeriesStore";

export function quietLogger(): SensorLogger {
  return new SensorLogger(LogLevel.ERROR, {}, {
    format: "json",
    timestamp: false,
    contextLevels: [],
  });
}

export interface TestStack {
  db: Database;
  registry: DeviceRegistry;
  store: TimeSeriesStore;
}

export async function openTestStack(
  options: { autoPointBudget?: number; gapThresholdMinutes?: number } = {}
): Promise<TestStack> {
  const db = await openDatabase({ path: ":memory:", threads: "1" });
  await createSchema(db.connection);
  const logger = quietLogger();
  const writeQueue = new SerialQueue();
  const registry = new DeviceRegistry({
    repository: new DeviceRepository(db.connection),
    logger,
    writeQueue,
    now: () => new Date("2024-01-01T00:00:00Z"),
  });
  const store = new TimeSeriesStore({
    readings: new ReadingRepository(db.connection),
    registry,
    logger,
    writeQueue,
    ...options,
  });
  return { db, registry, store };
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

export function toHex(data: Uint8Array): string {
  return Buffer.from(data).toString("hex");
}

// 2023-11-14T22:00:00Z, aligned to the hour
export const T = 1699999200;
