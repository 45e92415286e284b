import type { Logger } from "pino";
import { ProtocolError, TransportError, describeError } from "../errors";
import type { ProtocolOperation } from "../errors";
import { coilsFromMask, decodeCoilMask, ECHO_READ_VALUE } from "../heatpump/codec";
import type { RegisterSchema } from "../heatpump/definitions";
import { err, ok } from "../types/result";
import type { Result } from "../types/result";
import type { DeviceBus } from "./modbus/deviceBus";
import type { RegisterEcho } from "./modbus/ModbusRtuClient";

function hex(address: number): string {
  return `0x${address.toString(16).toUpperCase().padStart(2, "0")}`;
}

export class HeatPumpProtocol {
  constructor(
    private readonly bus: DeviceBus,
    private readonly schema: RegisterSchema,
    private readonly logger: Logger,
  ) {}

  async readCoils(): Promise<Result<Record<string, boolean>, ProtocolError>> {
    const { start, count, byteCount } = this.schema.coils;
    return this.attempt("readCoils", start, async () => {
      const frame = await this.bus.withBus((t) => t.readCoilFrame(start, count));
      const mask = decodeCoilMask(frame, byteCount, start);
      return coilsFromMask(mask, this.schema.coils);
    });
  }

  async readInputRegister(address: number): Promise<Result<number, ProtocolError>> {
    return this.attempt("readInputRegister", address, async () => {
      const values = await this.bus.withBus((t) => t.readInput(address, 1));
      const value = values[0];
      if (value === undefined) {
        throw new TransportError(`FC04 returned no data for ${hex(address)}`, "readInputRegister", address);
      }
      return value;
    });
  }

  /** Reads a register the device only exposes through FC06; the request is a write of 0x0000. */
  async echoRead(address: number): Promise<Result<number, ProtocolError>> {
    return this.attempt("echoRead", address, async () => {
      const echo = await this.bus.withBus((t) => t.writeSingle(address, ECHO_READ_VALUE));
      return echo.value;
    });
  }

  async writeRegister(address: number, value: number): Promise<Result<RegisterEcho, ProtocolError>> {
    return this.attempt("writeRegister", address, () =>
      this.bus.withBus((t) => t.writeSingle(address, value)),
    );
  }

  private async attempt<T>(
    operation: ProtocolOperation,
    address: number,
    run: () => Promise<T>,
  ): Promise<Result<T, ProtocolError>> {
    try {
      return ok(await run());
    } catch (cause) {
      const error =
        cause instanceof ProtocolError
          ? cause
          : new TransportError(`${operation} failed for ${hex(address)}: ${describeError(cause)}`, operation, address, {
              cause,
            });
      this.logger.warn({ err: error, operation, register: hex(address) }, "Modbus transaction failed");
      return err(error);
    }
  }
}
