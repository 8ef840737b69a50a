import { readFileSync } from "fs";
import { z } from "zod";
import { describeIssues } from "./common/validation";
import { ConfigError, describeError } from "./common/errors";
import { DEFAULT_DB_PATH } from "./db/connection";
import { DEFAULT_POINT_BUDGET } from "./store/resolution";

const storageSchema = z
  .object({
    path: z.string().min(1).default(DEFAULT_DB_PATH),
    threads: z.string().default("4"),
  })
  .default({});

const mqttSchema = z.object({
  url: z.string().url(),
  topic: z.string().min(1).default("ruuvi/#"),
  clientId: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  keepaliveSec: z.number().int().positive().default(30),
  reconnectPeriodMs: z.number().int().nonnegative().optional(),
});

const querySchema = z
  .object({
    autoPointBudget: z.number().int().positive().default(DEFAULT_POINT_BUDGET),
    gapThresholdMinutes: z.number().positive().default(60),
  })
  .default({});

export const configSchema = z.object({
  storage: storageSchema,
  mqtt: mqttSchema.optional(),
  query: querySchema,
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(data: unknown): Config {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Reads and validates the JSON configuration file at `path`. */
export function loadConfig(path: string): Config {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read configuration ${path}: ${describeError(e)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Configuration ${path} is not valid JSON: ${describeError(e)}`);
  }
  return parseConfig(data);
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv
): string | undefined {
  return env.CONFIG_PATH || argv[2];
}
