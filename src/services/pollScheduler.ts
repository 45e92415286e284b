import type { Logger } from "pino";
import { applyEchoAdjustment, combineWords, scaleRaw } from "../heatpump/codec";
import type { RegisterSchema } from "../heatpump/definitions";
import type { HeatPumpProtocol } from "./heatPumpProtocol";
import type { StateCache } from "./stateCache";

export type PollGroup = "coils" | "fastRegisters" | "slowMisc";

export const POLL_GROUPS: readonly PollGroup[] = ["coils", "fastRegisters", "slowMisc"];

export const POLL_INTERVALS_MS: Record<PollGroup, number> = {
  coils: 13_000,
  fastRegisters: 17_000,
  slowMisc: 60_000,
};

export class PollScheduler {
  // Monotonic timestamps of the last successful run; null until the first one.
  private readonly lastCompleted: Record<PollGroup, number | null> = {
    coils: null,
    fastRegisters: null,
    slowMisc: null,
  };

  constructor(
    private readonly protocol: HeatPumpProtocol,
    private readonly cache: StateCache,
    private readonly schema: RegisterSchema,
    private readonly logger: Logger,
    private readonly intervals: Record<PollGroup, number> = POLL_INTERVALS_MS,
  ) {}

  isDue(group: PollGroup, now: number): boolean {
    const last = this.lastCompleted[group];
    return last === null || now - last >= this.intervals[group];
  }

  lastCompletedAt(group: PollGroup): number | null {
    return this.lastCompleted[group];
  }

  /** Runs every due group in order, one after another. Returns the groups that completed. */
  async runDueGroups(now: number): Promise<PollGroup[]> {
    const completed: PollGroup[] = [];
    for (const group of POLL_GROUPS) {
      if (!this.isDue(group, now)) continue;
      const succeeded = await this.runGroup(group);
      if (succeeded) {
        this.lastCompleted[group] = now;
        completed.push(group);
      } else {
        this.logger.warn({ group }, "Poll group failed, retrying on next tick");
      }
    }
    return completed;
  }

  private runGroup(group: PollGroup): Promise<boolean> {
    switch (group) {
      case "coils":
        return this.pollCoils();
      case "fastRegisters":
        return this.pollFastRegisters();
      case "slowMisc":
        return this.pollSlowMisc();
    }
  }

  private async pollCoils(): Promise<boolean> {
    const result = await this.protocol.readCoils();
    if (!result.success) return false;
    this.cache.mergeCoils(result.data);
    return true;
  }

  private async pollFastRegisters(): Promise<boolean> {
    const { entries, omitted } = this.schema.inputRegisters;
    let anyRead = false;

    // Omitted registers are still read to keep the bus pattern the device expects.
    for (const register of entries) {
      const result = await this.protocol.readInputRegister(register.address);
      if (!result.success) continue;
      anyRead = true;
      if (omitted.has(register.address)) continue;
      this.cache.setInputRegister(register.label, scaleRaw(result.data, register.scale, register.decimals));
    }

    const { power } = this.schema;
    const powerResult = await this.protocol.readInputRegister(power.address);
    if (powerResult.success) {
      anyRead = true;
      this.cache.setInputRegister(power.label, scaleRaw(powerResult.data, power.scale, power.decimals));
    }
    return anyRead;
  }

  private async pollSlowMisc(): Promise<boolean> {
    let anyRead = false;

    const { energy } = this.schema;
    const high = await this.protocol.readInputRegister(energy.address);
    const low = await this.protocol.readInputRegister(energy.lowAddress);
    if (high.success && low.success) {
      anyRead = true;
      const raw = combineWords(high.data, low.data);
      this.cache.setInputRegister(energy.label, scaleRaw(raw, energy.scale, energy.decimals));
    }

    for (const register of this.schema.echoRegisters) {
      const result = await this.protocol.echoRead(register.address);
      if (!result.success) continue;
      anyRead = true;
      this.cache.setWriteRegister(register.label, applyEchoAdjustment(result.data, register));
    }
    return anyRead;
  }
}
