import {
  DuckDBInstance,
  type DuckDBConnection,
  type DuckDBMaterializedResult,
  type DuckDBResultReader,
  type DuckDBValue,
} from "@duckdb/node-api";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { SerialQueue } from "../common/serialQueue";

export const DEFAULT_DB_PATH = "./data/readings.duckdb";

export type StatementParams = Record<string, DuckDBValue>;

/**
 * A DuckDB connection that runs one statement at a time. The driver
 * rejects a statement issued while another is still executing on the
 * same connection, so every caller goes through this queue.
 */
export class SerialConnection {
  private readonly queue = new SerialQueue();

  constructor(readonly raw: DuckDBConnection) {}

  runAndReadAll(sql: string, params?: StatementParams): Promise<DuckDBResultReader> {
    return this.queue.run(() => this.raw.runAndReadAll(sql, params));
  }

  run(sql: string, params?: StatementParams): Promise<DuckDBMaterializedResult> {
    return this.queue.run(() => this.raw.run(sql, params));
  }
}

export interface DatabaseOptions {
  path?: string;
  threads?: string;
}

export interface Database {
  path: string;
  instance: DuckDBInstance;
  connection: SerialConnection;
  close(): void;
}

/**
 * Opens (creating if needed) a file-backed DuckDB database, or an
 * in-memory one for `:memory:`. Each call returns an independent handle.
 */
export async function openDatabase(options: DatabaseOptions = {}): Promise<Database> {
  const path = options.path ?? process.env.DUCKDB_PATH ?? DEFAULT_DB_PATH;
  if (path !== ":memory:") {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
  const instance = await DuckDBInstance.create(path, {
    threads: options.threads ?? process.env.DUCKDB_THREADS ?? "4",
  });
  const connection = await instance.connect();
  return {
    path,
    instance,
    connection: new SerialConnection(connection),
    close: () => connection.closeSync(),
  };
}
