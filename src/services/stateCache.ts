import { sortByLabel } from "../heatpump/codec";

export interface DeviceSnapshot {
  coils: Record<string, boolean>;
  inputRegisters: Record<string, number>;
  writeRegisters: Record<string, number>;
}

/** Wire form published on the measurement topic. */
export interface MeasurementPayload {
  coils: Record<string, 0 | 1>;
  input_registers: Record<string, number>;
  write_registers: Record<string, number>;
}

// Latest value per label. Entries are only ever added or overwritten, never removed,
// so a failed read leaves the previous value in place.
export class StateCache {
  private readonly coils = new Map<string, boolean>();
  private readonly inputRegisters = new Map<string, number>();
  private readonly writeRegisters = new Map<string, number>();

  mergeCoils(values: Record<string, boolean>): void {
    for (const [label, value] of Object.entries(values)) this.coils.set(label, value);
  }

  setInputRegister(label: string, value: number): void {
    this.inputRegisters.set(label, value);
  }

  setWriteRegister(label: string, value: number): void {
    this.writeRegisters.set(label, value);
  }

  snapshot(): DeviceSnapshot {
    return {
      coils: sortByLabel(Object.fromEntries(this.coils)),
      inputRegisters: sortByLabel(Object.fromEntries(this.inputRegisters)),
      writeRegisters: sortByLabel(Object.fromEntries(this.writeRegisters)),
    };
  }
}

export function toMeasurementPayload(snapshot: DeviceSnapshot): MeasurementPayload {
  const coils: Record<string, 0 | 1> = {};
  for (const [label, on] of Object.entries(sortByLabel(snapshot.coils))) {
    coils[label] = on ? 1 : 0;
  }
  return {
    coils,
    input_registers: sortByLabel(snapshot.inputRegisters),
    write_registers: sortByLabel(snapshot.writeRegisters),
  };
}

export function serializeSnapshot(snapshot: DeviceSnapshot): string {
  return JSON.stringify(toMeasurementPayload(snapshot));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberEntries(value: unknown, key: string): Record<string, number> {
  if (!isRecord(value)) throw new Error(`Measurement field "${key}" is not an object`);
  const out: Record<string, number> = {};
  for (const [label, v] of Object.entries(value)) {
    if (typeof v !== "number") throw new Error(`Measurement "${key}.${label}" is not a number`);
    out[label] = v;
  }
  return out;
}

export function parseSnapshot(json: string): DeviceSnapshot {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed)) throw new Error("Measurement payload is not an object");
  const coils: Record<string, boolean> = {};
  for (const [label, bit] of Object.entries(numberEntries(parsed.coils, "coils"))) {
    coils[label] = bit === 1;
  }
  return {
    coils,
    inputRegisters: numberEntries(parsed.input_registers, "input_registers"),
    writeRegisters: numberEntries(parsed.write_registers, "write_registers"),
  };
}
