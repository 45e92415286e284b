import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import type { Logger } from "pino";
import type { AppConfig } from "../config/options";
import type { DiscoveryMessage } from "./discovery";
import type { MessagePublisher } from "./snapshotPublisher";

export type MessageHandler = (topic: string, payload: Buffer) => Promise<unknown> | void;

export class MqttService implements MessagePublisher {
  private client: MqttClient | null = null;
  private connected = false;
  private reconnectDelay: number;
  private readonly topics = new Set<string>();
  private handler: MessageHandler | null = null;
  private discovery: DiscoveryMessage[] = [];

  constructor(
    private readonly config: AppConfig["mqtt"],
    private readonly logger: Logger,
  ) {
    this.reconnectDelay = config.reconnectMinMs;
  }

  onMessage(handler: MessageHandler): void {
    this.handler = handler;
  }

  /** Retained configs re-sent after every successful connect. */
  setDiscovery(messages: DiscoveryMessage[]): void {
    this.discovery = messages;
  }

  /** Topics are remembered and subscribed again after every reconnect. */
  async subscribe(topics: string[]): Promise<void> {
    topics.forEach((t) => this.topics.add(t));
    if (this.client && this.connected) {
      await this.subscribeAll(this.client);
    }
  }

  connect(): void {
    if (this.client) return;

    const brokerUrl = `mqtt://${this.config.host}:${this.config.port}`;
    this.logger.info({ brokerUrl }, "Connecting to MQTT broker");

    const client = mqtt.connect(brokerUrl, {
      username: this.config.user ?? undefined,
      password: this.config.password ?? undefined,
      clientId: this.config.clientId,
      clean: true,
      reconnectPeriod: this.config.reconnectMinMs,
    });
    this.client = client;

    client.on("connect", () => {
      this.connected = true;
      this.reconnectDelay = this.config.reconnectMinMs;
      client.options.reconnectPeriod = this.reconnectDelay;
      this.logger.info("MQTT connected");
      void this.onConnected(client);
    });

    client.on("reconnect", () => {
      // Attempt started; the one after it waits twice as long, up to the cap.
      this.reconnectDelay = Math.min(this.reconnectDelay * 2, this.config.reconnectMaxMs);
      client.options.reconnectPeriod = this.reconnectDelay;
      this.logger.debug({ nextDelayMs: this.reconnectDelay }, "MQTT reconnecting");
    });

    client.on("close", () => {
      if (this.connected) {
        this.logger.warn("MQTT connection closed");
        this.connected = false;
      }
    });

    client.on("error", (err) => {
      this.logger.error({ err }, "MQTT error");
    });

    client.on("message", (topic, payload) => {
      const handler = this.handler;
      if (!handler) return;
      Promise.resolve(handler(topic, payload)).catch((err: unknown) => {
        this.logger.error({ err, topic }, "MQTT message handler failed");
      });
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  currentReconnectDelay(): number {
    return this.reconnectDelay;
  }

  async publish(topic: string, payload: string, options: { retain: boolean }): Promise<boolean> {
    if (!this.client || !this.connected) {
      this.logger.debug({ topic }, "MQTT: publish called but not connected");
      return false;
    }
    try {
      await this.client.publishAsync(topic, payload, { retain: options.retain, qos: 0 });
      return true;
    } catch (err) {
      this.logger.error({ err, topic }, "Failed to publish MQTT message");
      return false;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      this.logger.info("MQTT: Disconnecting...");
      const client = this.client;
      this.client = null;
      this.connected = false;
      await client.endAsync();
    }
  }

  private async onConnected(client: MqttClient): Promise<void> {
    await this.subscribeAll(client);
    for (const message of this.discovery) {
      this.logger.debug({ topic: message.topic }, "MQTT: Publishing discovery config");
      await this.publish(message.topic, JSON.stringify(message.payload), { retain: true });
    }
  }

  private async subscribeAll(client: MqttClient): Promise<void> {
    if (this.topics.size === 0) return;
    const topics = [...this.topics];
    try {
      await client.subscribeAsync(topics);
      this.logger.info({ topics }, "MQTT subscribed to command topics");
    } catch (err) {
      this.logger.error({ err, topics }, "MQTT subscribe failed");
    }
  }
}
