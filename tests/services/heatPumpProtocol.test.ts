import { describe, expect, it } from "vitest";
import { FramingError, ProtocolError, TransportError } from "../../src/errors";
import { DVI_LV12_SCHEMA } from "../../src/heatpump/definitions";
import { HeatPumpProtocol } from "../../src/services/heatPumpProtocol";
import { DeviceBus } from "../../src/services/modbus/deviceBus";
import { FakeTransport, silentLogger } from "../helpers/fakeTransport";

function setup() {
  const transport = new FakeTransport();
  const bus = new DeviceBus(transport);
  const protocol = new HeatPumpProtocol(bus, DVI_LV12_SCHEMA, silentLogger);
  return { transport, bus, protocol };
}

describe("HeatPumpProtocol", () => {
  it("reads the 14-coil window starting at coil 1", async () => {
    const { transport, protocol } = setup();
    transport.coilFrame = Uint8Array.from([2, 0b0000_1001, 0b0100_0000]);

    const result = await protocol.readCoils();

    expect(transport.callsFor("readCoilFrame")).toEqual([{ op: "readCoilFrame", address: 1, value: 14 }]);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data["Soft starter Compressor"]).toBe(true);
    expect(result.data["Heating element"]).toBe(true);
    expect(result.data["Sum alarm failure"]).toBe(true);
    expect(result.data["Circ. pumpe CV"]).toBe(false);
  });

  it("fails a coil read whose byte count is not 2", async () => {
    const { transport, protocol, bus } = setup();
    transport.coilFrame = Uint8Array.from([3, 0xff, 0xff, 0xff]);

    const result = await protocol.readCoils();

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(FramingError);
    expect(result.error.operation).toBe("readCoils");
    expect(result.error.address).toBe(1);
    expect(bus.isBusy()).toBe(false);
  });

  it("reads one input register", async () => {
    const { transport, protocol } = setup();
    transport.inputs.set(0x06, 215);

    const result = await protocol.readInputRegister(0x06);

    expect(result).toEqual({ success: true, data: 215 });
    expect(transport.callsFor("readInput")).toEqual([{ op: "readInput", address: 6, value: 1 }]);
  });

  it("echo-reads by writing 0x0000 and returning the reply value", async () => {
    const { transport, protocol } = setup();
    transport.echoes.set(0xd0, 305);

    const result = await protocol.echoRead(0xd0);

    expect(result).toEqual({ success: true, data: 305 });
    expect(transport.calls).toEqual([{ op: "writeSingle", address: 0xd0, value: 0 }]);
  });

  it("wraps transport failures with the register and cause", async () => {
    const { transport, protocol, bus } = setup();
    transport.failing.add(0xa1);

    const result = await protocol.echoRead(0xa1);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error).toBeInstanceOf(ProtocolError);
    expect(result.error.address).toBe(0xa1);
    expect(result.error.operation).toBe("echoRead");
    expect(result.error.message).toBe("echoRead failed for 0xA1: Timed out");
    expect(result.error.cause).toBeInstanceOf(Error);
    expect(bus.isBusy()).toBe(false);
  });

  it("writes a register with a genuine FC06 transaction", async () => {
    const { transport, protocol } = setup();

    const result = await protocol.writeRegister(0x10b, 22);

    expect(result).toEqual({ success: true, data: { address: 0x10b, value: 22 } });
    expect(transport.calls).toEqual([{ op: "writeSingle", address: 0x10b, value: 22 }]);
  });
});
