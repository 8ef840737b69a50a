/**
 * Ingest service: subscribes to the gateway's MQTT topic and persists
 * every decoded reading.
 */
import { newClient } from "./clients/mqtt";
import { getLogger } from "./common/logger";
import { SensorVaultError } from "./common/errors";
import { loadConfig, resolveConfigPath } from "./config";
import { openServices } from "./service";

const logger = getLogger();

async function main() {
  const configPath = resolveConfigPath();
  if (!configPath) {
    logger.error("Please provide the path to the configuration file as an argument.");
    process.exit(1);
  }
  const config = loadConfig(configPath);
  const services = await openServices(config, logger);

  if (!config.mqtt) {
    logger.warn("No mqtt section configured; nothing to ingest");
    services.close();
    return;
  }

  const client = newClient({
    serverUrl: config.mqtt.url,
    topic: config.mqtt.topic,
    clientId: config.mqtt.clientId,
    username: config.mqtt.username,
    password: config.mqtt.password,
    keepalive: config.mqtt.keepaliveSec,
    reconnectPeriod: config.mqtt.reconnectPeriodMs,
    logger,
  });

  let stored = 0;
  let duplicates = 0;

  client.on("connect", () => logger.info("Connected"));
  client.on("reconnect", () => logger.info("Reconnecting"));
  client.on("close", () => logger.info("Closed"));
  client.on("offline", () => logger.info("Offline"));
  client.on("error", (e) => logger.with().error(e).logger().error("MQTT error"));
  client.on("rejected", (r) =>
    logger.with().str("topic", r.topic).str("reason", r.reason).logger().debug("Skipped message")
  );

  client.on("reading", (reading, topic) => {
    services.store.insert(reading).then(
      (outcome) => {
        if (outcome.status === "inserted") stored++;
        else duplicates++;
      },
      (err: unknown) => {
        const log = logger.with().str("topic", topic).str("device", reading.deviceId).error(err).logger();
        if (err instanceof SensorVaultError && !err.retryable) {
          log.warn("Reading rejected");
        } else {
          log.error("Failed to store reading");
        }
      }
    );
  });

  const stats = setInterval(() => {
    logger
      .with()
      .bool("connected", client.isConnected)
      .num("stored", stored)
      .num("duplicates", duplicates)
      .logger()
      .info("Ingest stats");
    stored = duplicates = 0;
  }, 60_000);

  // Graceful shutdown
  function shutdown(sig: string) {
    logger.info(`Received ${sig}, shutting down...`);
    clearInterval(stats);
    client.stop();
    services.close();
    process.exit(0);
  }
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.with().error(err).logger().error("Fatal startup error");
  process.exit(1);
});
