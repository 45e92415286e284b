import type { Logger } from "pino";
import { MEASUREMENT_TOPIC } from "../heatpump/definitions";
import { serializeSnapshot } from "./stateCache";
import type { DeviceSnapshot } from "./stateCache";

export interface MessagePublisher {
  /** Resolves true once the message has been handed to a connected broker. */
  publish(topic: string, payload: string, options: { retain: boolean }): Promise<boolean>;
}

export class SnapshotPublisher {
  // Serialized form of the last transmitted snapshot. Snapshots are label-sorted,
  // so equal JSON means equal mappings.
  private published: string | undefined;

  constructor(
    private readonly sink: MessagePublisher,
    private readonly logger: Logger,
    private readonly topic: string = MEASUREMENT_TOPIC,
  ) {}

  async publishIfChanged(snapshot: DeviceSnapshot): Promise<boolean> {
    const payload = serializeSnapshot(snapshot);
    if (payload === this.published) return false;

    let sent = false;
    try {
      sent = await this.sink.publish(this.topic, payload, { retain: false });
    } catch (err) {
      this.logger.error({ err, topic: this.topic }, "Failed to publish measurement");
    }
    if (!sent) {
      this.logger.debug({ topic: this.topic }, "Measurement not sent, will retry on next tick");
      return false;
    }

    this.published = payload;
    this.logger.debug({ topic: this.topic, payload }, "Published measurement");
    return true;
  }

  lastPublished(): string | undefined {
    return this.published;
  }
}
