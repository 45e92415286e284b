export interface ScaledRegister {
  address: number;
  label: string;
  scale: number; // multiply raw value by scale (e.g., 0.1)
  decimals: number;
  unit?: string; // discovery hint
  deviceClass?: string; // discovery hint
  stateClass?: string; // discovery hint
}

export interface EchoRegister {
  address: number;
  label: string;
  adjust?: { multiplier: number; decimals: number };
}

export interface CoilDefinition {
  index: number;
  name: string;
}

export interface CommandDefinition {
  topic: string;
  register: number;
  scale: number;
  stateLabel?: string; // echo register that reflects this command
  kind: "select" | "number";
  options?: string[];
  min?: number;
  max?: number;
  step?: number;
}

export interface RegisterSchema {
  coils: {
    start: number; // first coil addressed by the FC01 window
    count: number;
    byteCount: number;
    entries: readonly CoilDefinition[];
  };
  inputRegisters: {
    entries: readonly ScaledRegister[];
    omitted: ReadonlySet<number>;
  };
  power: ScaledRegister;
  energy: ScaledRegister & { lowAddress: number };
  echoRegisters: readonly EchoRegister[];
  commands: readonly CommandDefinition[];
}

export interface DeviceInfo {
  name: string;
  identifiers: string[];
  manufacturer: string;
  model: string;
}

export const MEASUREMENT_TOPIC = "dvi/measurement";
export const COMMAND_TOPIC_PREFIX = "dvi/command/";

export const DVI_LV12_DEVICE: DeviceInfo = {
  name: "DVI LV12",
  identifiers: ["dvi_lv12"],
  manufacturer: "DVI",
  model: "LV12 Heatpump",
};

function temperature(address: number, label: string): ScaledRegister {
  return {
    address,
    label,
    scale: 0.1,
    decimals: 1,
    unit: "°C",
    deviceClass: "temperature",
    stateClass: "measurement",
  };
}

// Coil 13 is not wired on the LV12 and must never be reported.
const LV12_COILS: CoilDefinition[] = [
  { index: 0, name: "Soft starter Compressor" },
  { index: 1, name: "3-vay shunt VV open/close" },
  { index: 2, name: "Start/stop expansion valve" },
  { index: 3, name: "Heating element" },
  { index: 4, name: "Circ. pump warm side" },
  { index: 5, name: "El-tracing CV/drain" },
  { index: 8, name: "4-vay valve defrost" },
  { index: 9, name: "liquid injection solenoid valve" },
  { index: 10, name: "3-way shunt CV open" },
  { index: 11, name: "3-way shunt CV close" },
  { index: 12, name: "Circ. pumpe CV" },
  { index: 14, name: "Sum alarm failure" },
];

const LV12_INPUT_REGISTERS: ScaledRegister[] = [
  temperature(0x01, "CV Forward"),
  temperature(0x02, "CV Return"),
  temperature(0x03, "Storage tank VV"),
  temperature(0x04, "sensor_4"),
  temperature(0x05, "Storage tank CV"),
  temperature(0x06, "Evaporator"),
  temperature(0x07, "Outdoor"),
  temperature(0x08, "sensor_8"),
  temperature(0x09, "sensor_9"),
  temperature(0x0a, "sensor_10"),
  temperature(0x0b, "Compressor HP"),
  temperature(0x0c, "Compressor LP"),
  temperature(0x0d, "sensor_13"),
  temperature(0x0e, "sensor_14"),
];

const LV12_ECHO_REGISTERS: EchoRegister[] = [
  { address: 0x01, label: "cv_mode" },
  { address: 0x02, label: "cv_curve" },
  { address: 0x03, label: "cv_setpoint" },
  { address: 0x04, label: "cv_night_setback" },
  { address: 0x0a, label: "vv_mode" },
  { address: 0x0b, label: "vv_setpoint" },
  { address: 0x0c, label: "vv_schedule" },
  { address: 0x0f, label: "aux_heating" },
  { address: 0xa1, label: "comp_hours" },
  { address: 0xa2, label: "vv_hours" },
  { address: 0xa3, label: "heating_hours" },
  { address: 0xd0, label: "curve_temp", adjust: { multiplier: 0.1, decimals: 1 } },
];

const LV12_COMMANDS: CommandDefinition[] = [
  {
    topic: `${COMMAND_TOPIC_PREFIX}vvstate`,
    register: 0x10a,
    scale: 1,
    stateLabel: "vv_mode",
    kind: "select",
    options: ["0", "1"],
  },
  {
    topic: `${COMMAND_TOPIC_PREFIX}cvstate`,
    register: 0x101,
    scale: 1,
    stateLabel: "cv_mode",
    kind: "select",
    options: ["0", "1"],
  },
  {
    topic: `${COMMAND_TOPIC_PREFIX}cvcurve`,
    register: 0x102,
    scale: 1,
    stateLabel: "cv_curve",
    kind: "number",
    min: 0,
    max: 100,
    step: 1,
  },
  {
    topic: `${COMMAND_TOPIC_PREFIX}vvsetpoint`,
    register: 0x10b,
    scale: 1,
    stateLabel: "vv_setpoint",
    kind: "number",
    min: 0,
    max: 100,
    step: 1,
  },
  {
    topic: `${COMMAND_TOPIC_PREFIX}tvstate`,
    register: 0x10f,
    scale: 1,
    stateLabel: "aux_heating",
    kind: "select",
    options: ["0", "1"],
  },
];

export const DVI_LV12_SCHEMA: RegisterSchema = {
  coils: {
    start: 0x0001,
    count: 14,
    byteCount: 2,
    entries: LV12_COILS,
  },
  inputRegisters: {
    entries: LV12_INPUT_REGISTERS,
    omitted: new Set([0x04, 0x08, 0x09, 0x0a, 0x0d, 0x0e]),
  },
  power: {
    address: 0x24,
    label: "em23_power",
    scale: 0.0001,
    decimals: 4,
    unit: "kW",
    deviceClass: "power",
    stateClass: "measurement",
  },
  energy: {
    address: 0x25,
    lowAddress: 0x26,
    label: "em23_energy",
    scale: 0.1,
    decimals: 1,
    unit: "kWh",
    deviceClass: "energy",
    stateClass: "total_increasing",
  },
  echoRegisters: LV12_ECHO_REGISTERS,
  commands: LV12_COMMANDS,
};

export function findCommand(schema: RegisterSchema, topic: string): CommandDefinition | undefined {
  return schema.commands.find((c) => c.topic === topic);
}

export function publishedInputRegisters(schema: RegisterSchema): ScaledRegister[] {
  return schema.inputRegisters.entries.filter((r) => !schema.inputRegisters.omitted.has(r.address));
}

/** Throws if any sub-table repeats an address, or a label is shared between published tables. */
export function assertSchemaConsistent(schema: RegisterSchema): void {
  const unique = (what: string, values: number[]) => {
    const seen = new Set<number>();
    for (const v of values) {
      if (seen.has(v)) throw new Error(`Duplicate ${what} index 0x${v.toString(16)}`);
      seen.add(v);
    }
  };
  unique("coil", schema.coils.entries.map((c) => c.index));
  unique("input register", schema.inputRegisters.entries.map((r) => r.address));
  unique("echo register", schema.echoRegisters.map((r) => r.address));
  unique("command register", schema.commands.map((c) => c.register));

  for (const coil of schema.coils.entries) {
    if (coil.index >= schema.coils.byteCount * 8) {
      throw new Error(`Coil ${coil.index} lies outside the ${schema.coils.byteCount}-byte mask`);
    }
  }

  const owners = new Map<string, string>();
  const claim = (section: string, label: string) => {
    const owner = owners.get(label);
    if (owner && owner !== section) {
      throw new Error(`Label "${label}" appears in both ${owner} and ${section}`);
    }
    owners.set(label, section);
  };
  schema.coils.entries.forEach((c) => claim("coils", c.name));
  publishedInputRegisters(schema).forEach((r) => claim("input_registers", r.label));
  claim("input_registers", schema.power.label);
  claim("input_registers", schema.energy.label);
  schema.echoRegisters.forEach((r) => claim("write_registers", r.label));
}
