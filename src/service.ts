import type { Logger } from "./common/logger";
import { SerialQueue } from "./common/serialQueue";
import type { Config } from "./config";
import { openDatabase, type Database } from "./db/connection";
import { DeviceRepository, ReadingRepository } from "./db/repositories";
import { createSchema } from "./db/schema";
import { DeviceRegistry } from "./registry/deviceRegistry";
import { TimeSeriesStore } from "./store/timeSeriesStore";

export interface Services {
  db: Database;
  registry: DeviceRegistry;
  store: TimeSeriesStore;
  close(): void;
}

/**
 * Opens the database, creates missing tables and wires the registry and
 * store onto one connection and one write queue.
 */
export async function openServices(config: Config, logger: Logger): Promise<Services> {
  const db = await openDatabase({
    path: config.storage.path,
    threads: config.storage.threads,
  });
  await createSchema(db.connection);

  const writeQueue = new SerialQueue();
  const registry = new DeviceRegistry({
    repository: new DeviceRepository(db.connection),
    logger,
    writeQueue,
  });
  const store = new TimeSeriesStore({
    readings: new ReadingRepository(db.connection),
    registry,
    logger,
    writeQueue,
    autoPointBudget: config.query.autoPointBudget,
    gapThresholdMinutes: config.query.gapThresholdMinutes,
  });

  logger.with().str("path", db.path).logger().info("Storage ready");
  return { db, registry, store, close: () => db.close() };
}
