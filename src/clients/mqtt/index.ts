import * as mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import events from "events";
import { deviceFromTopic, parseMqttMessage } from "../../adapters/mqtt";
import type { DecodeError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import type { CanonicalReading } from "../../types";

function getRequiredProperty<C extends object, P extends keyof C & string>(
  config: C,
  propName: P
): C[P] {
  if (config[propName] !== undefined) {
    return config[propName];
  }
  throw new Error("Missing required configuration property '" + propName + "'");
}

function getProperty<C, P extends keyof C, DEFAULT extends C[P]>(
  config: C,
  propName: P,
  defaultValue: DEFAULT
): Exclude<C[P], undefined> | DEFAULT {
  const value = config[propName];
  return value !== undefined ? (value as Exclude<C[P], undefined>) : defaultValue;
}

export type GatewayClientOptions = {
  serverUrl: string;
  topic?: string;
  username?: string;
  password?: string;
  clientId?: string;
  keepalive?: number;
  reconnectPeriod?: number;
  logger: Logger;
};

export type RejectedMessage = {
  topic: string;
  reason: string;
  error?: DecodeError;
};

export interface GatewayClient extends events.EventEmitter {
  /** MQTT client event */
  on(event: "connect" | "close" | "reconnect" | "offline" | "end", listener: () => void): this;
  /** MQTT client event */
  on(event: "error", listener: (error: Error) => void): this;
  /** a message decoded into a reading */
  on(event: "reading", listener: (reading: CanonicalReading, topic: string) => void): this;
  /** a message that could not be turned into a reading */
  on(event: "rejected", listener: (rejected: RejectedMessage) => void): this;

  emit(event: "connect" | "close" | "reconnect" | "offline" | "end"): boolean;
  emit(event: "error", error: Error): boolean;
  emit(event: "reading", reading: CanonicalReading, topic: string): boolean;
  emit(event: "rejected", rejected: RejectedMessage): boolean;
}

/*
 * Subscribes to the gateway's MQTT topic and turns each message into a
 * canonical reading.
 */
export class GatewayClient extends events.EventEmitter {
  private serverUrl: string;
  private topic: string;
  private mqttOptions: IClientOptions;

  private client: null | MqttClient = null;
  private connecting = false;
  private connected = false;

  private logger: Logger;

  constructor(config: GatewayClientOptions) {
    super();
    this.logger = getRequiredProperty(config, "logger");
    this.serverUrl = getRequiredProperty(config, "serverUrl");
    this.topic = getProperty(config, "topic", "ruuvi/#");

    this.mqttOptions = {
      clientId: getProperty(config, "clientId", `sensorvault_${process.pid}`),
      clean: true,
      keepalive: getProperty(config, "keepalive", 30),
      connectTimeout: 30000,
      username: getProperty(config, "username", undefined),
      password: getProperty(config, "password", undefined),
    };
    const reconnectPeriod = getProperty(config, "reconnectPeriod", undefined);
    if (reconnectPeriod !== undefined) {
      this.mqttOptions.reconnectPeriod = reconnectPeriod;
    }

    this.init();
  }

  get isConnected(): boolean {
    return this.connected;
  }

  stop() {
    this.client?.end();
  }

  private subscribe() {
    this.logger.info(`Subscribing to topic: ${this.topic}`);
    this.client?.subscribe(this.topic, { qos: 1 }, (err) => {
      if (err) {
        this.logger.with().error(err).logger().error(`Subscribe to ${this.topic} failed`);
        this.emit("error", err);
        return;
      }
      this.logger.info(`Subscribed to ${this.topic}`);
    });
  }

  private handleMessage(topic: string, message: Buffer) {
    const result = parseMqttMessage(message, new Date(), deviceFromTopic(topic));
    if (!result.ok) {
      if (this.logger.isDebugEnabled()) {
        this.logger
          .with()
          .str("topic", topic)
          .str("reason", result.reason)
          .logger()
          .debug("Message rejected");
      }
      this.emit("rejected", { topic, reason: result.reason, error: result.error });
      return;
    }
    if (this.logger.isTraceEnabled()) {
      this.logger
        .with()
        .str("topic", topic)
        .any("reading", result.reading)
        .logger()
        .trace(`Received reading on topic ${topic}`);
    }
    this.emit("reading", result.reading, topic);
  }

  // Configures and connects the client
  private init() {
    this.connecting = true;
    this.logger.info("Attempting to connect: " + this.serverUrl);
    const client = mqtt.connect(this.serverUrl, this.mqttOptions);
    this.client = client;

    client.on("connect", () => {
      this.logger.info("Client has connected");
      this.connecting = false;
      this.connected = true;
      this.subscribe();
      this.emit("connect");
    });

    client.on("error", (error) => {
      this.emit("error", error);
      if (this.connecting) {
        client.end();
      }
    });

    client.on("close", () => {
      if (this.connected) {
        this.connected = false;
        this.emit("close");
      }
    });

    client.on("reconnect", () => {
      this.connecting = true;
      this.emit("reconnect");
    });

    client.on("offline", () => {
      this.emit("offline");
    });

    client.on("end", () => {
      this.emit("end");
    });

    client.on("message", (topic, message) => {
      this.handleMessage(topic, message);
    });
  }
}

export function newClient(config: GatewayClientOptions): GatewayClient {
  return new GatewayClient(config);
}
