import { describe, expect, it } from "vitest";
import { ParseError } from "../../src/errors";
import { DVI_LV12_SCHEMA } from "../../src/heatpump/definitions";
import type { CommandDefinition } from "../../src/heatpump/definitions";
import { CommandDispatcher, parseCommandValue } from "../../src/services/commandDispatcher";
import { HeatPumpProtocol } from "../../src/services/heatPumpProtocol";
import { DeviceBus } from "../../src/services/modbus/deviceBus";
import { FakeTransport, silentLogger } from "../helpers/fakeTransport";

function setup() {
  const transport = new FakeTransport();
  const protocol = new HeatPumpProtocol(new DeviceBus(transport), DVI_LV12_SCHEMA, silentLogger);
  const dispatcher = new CommandDispatcher(protocol, DVI_LV12_SCHEMA, silentLogger);
  return { transport, dispatcher };
}

describe("CommandDispatcher", () => {
  it("lists one topic per command", () => {
    const { dispatcher } = setup();
    expect(dispatcher.topics()).toEqual([
      "dvi/command/vvstate",
      "dvi/command/cvstate",
      "dvi/command/cvcurve",
      "dvi/command/vvsetpoint",
      "dvi/command/tvstate",
    ]);
  });

  it("writes a setpoint to its mapped register", async () => {
    const { transport, dispatcher } = setup();

    const outcome = await dispatcher.handleMessage("dvi/command/vvsetpoint", Buffer.from("22"));

    expect(outcome).toEqual({ kind: "written", register: 0x10b, value: 22 });
    expect(transport.calls).toEqual([{ op: "writeSingle", address: 0x10b, value: 22 }]);
    expect(dispatcher.getState()).toBe("idle");
  });

  it("trims whitespace around the payload", async () => {
    const { transport, dispatcher } = setup();

    await dispatcher.handleMessage("dvi/command/cvstate", Buffer.from(" 1\n"));

    expect(transport.calls).toEqual([{ op: "writeSingle", address: 0x101, value: 1 }]);
  });

  it("ignores unmapped topics without writing", async () => {
    const { transport, dispatcher } = setup();

    const outcome = await dispatcher.handleMessage("dvi/command/unknown", Buffer.from("22"));

    expect(outcome).toEqual({ kind: "ignored" });
    expect(transport.calls).toEqual([]);
  });

  it.each(["", "abc", "2.5", "1e3", "0x10", "22 kW"])("rejects payload %j", async (payload) => {
    const { transport, dispatcher } = setup();

    const outcome = await dispatcher.handleMessage("dvi/command/vvsetpoint", Buffer.from(payload));

    expect(outcome.kind).toBe("rejected");
    if (outcome.kind === "rejected") expect(outcome.error).toBeInstanceOf(ParseError);
    expect(transport.calls).toEqual([]);
  });

  it("rejects values that do not fit a register", async () => {
    const { transport, dispatcher } = setup();

    expect((await dispatcher.handleMessage("dvi/command/cvcurve", "-1")).kind).toBe("rejected");
    expect((await dispatcher.handleMessage("dvi/command/cvcurve", "65536")).kind).toBe("rejected");
    expect(transport.calls).toEqual([]);
  });

  it("swallows write failures and does not retry", async () => {
    const { transport, dispatcher } = setup();
    transport.failing.add(0x10a);

    const outcome = await dispatcher.handleMessage("dvi/command/vvstate", Buffer.from("1"));

    expect(outcome).toEqual({ kind: "failed", register: 0x10a, value: 1 });
    expect(transport.callsFor("writeSingle")).toHaveLength(1);
    expect(dispatcher.getState()).toBe("idle");
  });

  it("reports writing while a write is on the bus", async () => {
    const { transport, dispatcher } = setup();
    transport.delayMs = 5;

    const pending = dispatcher.handleMessage("dvi/command/tvstate", "1");
    expect(dispatcher.getState()).toBe("writing");
    await pending;
    expect(dispatcher.getState()).toBe("idle");
  });
});

describe("parseCommandValue", () => {
  const scaled: CommandDefinition = { topic: "t", register: 1, scale: 10, kind: "number" };

  it("multiplies by the scale factor", () => {
    expect(parseCommandValue("t", "+7", scaled)).toBe(70);
  });

  it("names the topic and payload in the error", () => {
    expect(() => parseCommandValue("t", "warm", scaled)).toThrow('Payload "warm" on t is not an integer');
  });
});
