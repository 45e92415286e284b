import { describe, expect, it } from "vitest";
import { FramingError } from "../../src/errors";
import {
  applyEchoAdjustment,
  coilsFromMask,
  combineWords,
  decodeCoilMask,
  scaleRaw,
  sortByLabel,
} from "../../src/heatpump/codec";
import { DVI_LV12_SCHEMA } from "../../src/heatpump/definitions";

const coils = DVI_LV12_SCHEMA.coils;

describe("decodeCoilMask", () => {
  it("combines the coil bytes low byte first", () => {
    expect(decodeCoilMask(Uint8Array.from([2, 0x34, 0x12]), 2, 1)).toBe(0x1234);
  });

  it.each([0, 1, 3, 255])("rejects byte count %i", (byteCount) => {
    const frame = Uint8Array.from([byteCount, 0xff, 0xff, 0xff]);
    expect(() => decodeCoilMask(frame, 2, 1)).toThrow(FramingError);
  });

  it("rejects a frame shorter than its byte count", () => {
    expect(() => decodeCoilMask(Uint8Array.from([2, 0x01]), 2, 1)).toThrow(FramingError);
    expect(() => decodeCoilMask(new Uint8Array(0), 2, 1)).toThrow(/byte count missing/);
  });
});

describe("coilsFromMask", () => {
  it.each(Array.from({ length: 16 }, (_, bit) => bit))("maps bit %i to the coil with that index", (bit) => {
    const decoded = coilsFromMask(2 ** bit, coils);
    for (const coil of coils.entries) {
      expect(decoded[coil.name]).toBe(coil.index === bit);
    }
  });

  it("never reports index 13", () => {
    const decoded = coilsFromMask(0xffff, coils);
    expect(Object.keys(decoded)).toHaveLength(12);
    expect(Object.values(decoded).every(Boolean)).toBe(true);
    expect(coils.entries.some((c) => c.index === 13)).toBe(false);
  });

  it("reads the compressor soft starter from bit 0 and the alarm from bit 14", () => {
    const decoded = coilsFromMask(0b0100_0000_0000_0001, coils);
    expect(decoded["Soft starter Compressor"]).toBe(true);
    expect(decoded["Sum alarm failure"]).toBe(true);
    expect(decoded["Heating element"]).toBe(false);
  });
});

describe("scaling", () => {
  it("scales and rounds to the given decimals", () => {
    expect(scaleRaw(215, 0.1, 1)).toBe(21.5);
    expect(scaleRaw(12345, 0.0001, 4)).toBe(1.2345);
    expect(scaleRaw(42, 1, 0)).toBe(42);
  });

  it("combines a high and low word into an unsigned 32-bit value", () => {
    expect(combineWords(0x0001, 0x2345)).toBe(74565);
    expect(combineWords(0xffff, 0xffff)).toBe(0xffffffff);
    expect(scaleRaw(combineWords(0x0001, 0x2345), 0.1, 1)).toBe(7456.5);
  });

  it("applies echo adjustments only where configured", () => {
    expect(applyEchoAdjustment(305, { address: 0xd0, label: "curve_temp", adjust: { multiplier: 0.1, decimals: 1 } })).toBe(30.5);
    expect(applyEchoAdjustment(42, { address: 0xa1, label: "comp_hours" })).toBe(42);
  });
});

describe("sortByLabel", () => {
  it("orders keys by code unit", () => {
    const sorted = sortByLabel({ b: 1, Outdoor: 2, "CV Return": 3, a: 4 });
    expect(Object.keys(sorted)).toEqual(["CV Return", "Outdoor", "a", "b"]);
  });
});
