import { performance } from "perf_hooks";
import type { Logger } from "pino";
import { assertSchemaConsistent, DVI_LV12_SCHEMA } from "../heatpump/definitions";
import type { RegisterSchema } from "../heatpump/definitions";
import { CommandDispatcher } from "./commandDispatcher";
import type { DispatchOutcome } from "./commandDispatcher";
import { HeatPumpProtocol } from "./heatPumpProtocol";
import { DeviceBus } from "./modbus/deviceBus";
import type { DeviceTransport } from "./modbus/ModbusRtuClient";
import { PollScheduler, POLL_INTERVALS_MS } from "./pollScheduler";
import type { PollGroup } from "./pollScheduler";
import { SnapshotPublisher } from "./snapshotPublisher";
import type { MessagePublisher } from "./snapshotPublisher";
import { StateCache } from "./stateCache";

const TICK_INTERVAL_MS = 1_000;

export interface BridgeEngineOptions {
  schema?: RegisterSchema;
  tickMs?: number;
  intervals?: Record<PollGroup, number>;
  now?: () => number; // monotonic milliseconds
}

/** Owns every piece of bridge state; built once at startup. */
export class BridgeEngine {
  readonly schema: RegisterSchema;
  readonly bus: DeviceBus;
  readonly cache = new StateCache();
  readonly protocol: HeatPumpProtocol;
  readonly scheduler: PollScheduler;
  readonly publisher: SnapshotPublisher;
  readonly dispatcher: CommandDispatcher;

  private readonly tickMs: number;
  private readonly now: () => number;
  private tickTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    transport: DeviceTransport,
    sink: MessagePublisher,
    private readonly logger: Logger,
    options: BridgeEngineOptions = {},
  ) {
    this.schema = options.schema ?? DVI_LV12_SCHEMA;
    assertSchemaConsistent(this.schema);
    this.tickMs = options.tickMs ?? TICK_INTERVAL_MS;
    this.now = options.now ?? (() => performance.now());

    this.bus = new DeviceBus(transport);
    this.protocol = new HeatPumpProtocol(this.bus, this.schema, logger);
    this.scheduler = new PollScheduler(
      this.protocol,
      this.cache,
      this.schema,
      logger,
      options.intervals ?? POLL_INTERVALS_MS,
    );
    this.publisher = new SnapshotPublisher(sink, logger);
    this.dispatcher = new CommandDispatcher(this.protocol, this.schema, logger);
  }

  commandTopics(): string[] {
    return this.dispatcher.topics();
  }

  handleMessage(topic: string, payload: Buffer | string): Promise<DispatchOutcome> {
    return this.dispatcher.handleMessage(topic, payload);
  }

  /** One scheduler pass: due groups, then a publish if the snapshot changed. */
  async tick(): Promise<PollGroup[]> {
    const completed = await this.scheduler.runDueGroups(this.now());
    if (completed.length > 0) {
      this.logger.debug({ groups: completed }, "Poll groups completed");
    }
    await this.publisher.publishIfChanged(this.cache.snapshot());
    return completed;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info({ tickMs: this.tickMs }, "Starting bridge engine");
    this.runTick();
  }

  stop(): void {
    this.running = false;
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
      this.tickTimer = null;
    }
    this.logger.info("Stopped bridge engine");
  }

  isRunning(): boolean {
    return this.running;
  }

  // Next tick is armed only after the current one settles, so ticks never overlap.
  private runTick(): void {
    void this.tick()
      .catch((err: unknown) => {
        this.logger.error({ err }, "Bridge tick failed");
      })
      .finally(() => this.scheduleNextTick());
  }

  private scheduleNextTick(): void {
    if (!this.running) return;
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
    }
    this.tickTimer = setTimeout(() => {
      this.tickTimer = null;
      this.runTick();
    }, this.tickMs);
  }
}
