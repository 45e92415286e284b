import type { Logger } from "pino";
import { ParseError } from "../errors";
import { findCommand } from "../heatpump/definitions";
import type { CommandDefinition, RegisterSchema } from "../heatpump/definitions";
import type { HeatPumpProtocol } from "./heatPumpProtocol";

export type DispatcherState = "idle" | "writing";

export type DispatchOutcome =
  | { kind: "ignored" }
  | { kind: "rejected"; error: ParseError }
  | { kind: "written"; register: number; value: number }
  | { kind: "failed"; register: number; value: number };

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseCommandValue(topic: string, payload: string, command: CommandDefinition): number {
  const text = payload.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new ParseError(`Payload "${text}" on ${topic} is not an integer`, topic, text);
  }
  const scaled = Number.parseInt(text, 10) * command.scale;
  if (!Number.isInteger(scaled) || scaled < 0 || scaled > 0xffff) {
    throw new ParseError(`Value ${scaled} on ${topic} does not fit a 16-bit register`, topic, text);
  }
  return scaled;
}

/**
 * Turns command messages into single-register writes. Each message produces at
 * most one write and is never retried; writes queue on the bus behind polling.
 */
export class CommandDispatcher {
  private state: DispatcherState = "idle";
  private pending = 0;

  constructor(
    private readonly protocol: HeatPumpProtocol,
    private readonly schema: RegisterSchema,
    private readonly logger: Logger,
  ) {}

  topics(): string[] {
    return this.schema.commands.map((c) => c.topic);
  }

  getState(): DispatcherState {
    return this.state;
  }

  async handleMessage(topic: string, payload: Buffer | string): Promise<DispatchOutcome> {
    const command = findCommand(this.schema, topic);
    if (!command) return { kind: "ignored" };

    const text = typeof payload === "string" ? payload : payload.toString("utf8");
    let value: number;
    try {
      value = parseCommandValue(topic, text, command);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.logger.warn({ err: error, topic }, "Command rejected");
      return { kind: "rejected", error };
    }

    this.pending++;
    this.state = "writing";
    try {
      const result = await this.protocol.writeRegister(command.register, value);
      if (!result.success) {
        this.logger.error({ topic, register: command.register, value }, "Command write failed");
        return { kind: "failed", register: command.register, value };
      }
      this.logger.info({ topic, register: command.register, value }, "Command written");
      return { kind: "written", register: command.register, value };
    } finally {
      this.pending--;
      if (this.pending === 0) this.state = "idle";
    }
  }
}
