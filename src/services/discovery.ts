import { DVI_LV12_DEVICE, MEASUREMENT_TOPIC, publishedInputRegisters } from "../heatpump/definitions";
import type { DeviceInfo, RegisterSchema, ScaledRegister } from "../heatpump/definitions";

const DISCOVERY_PREFIX = "homeassistant";
const UID_PREFIX = "dvi_lv12";

export interface DiscoveryMessage {
  topic: string;
  payload: Record<string, unknown>;
}

function sensorFor(uniqueId: string, name: string, valueTemplate: string, register?: ScaledRegister) {
  const payload: Record<string, unknown> = {
    name,
    state_topic: MEASUREMENT_TOPIC,
    value_template: valueTemplate,
    unique_id: uniqueId,
  };
  if (register?.unit) payload.unit_of_measurement = register.unit;
  if (register?.deviceClass) payload.device_class = register.deviceClass;
  if (register?.stateClass) payload.state_class = register.stateClass;
  return payload;
}

function commandName(topic: string): string {
  return topic.split("/").pop() ?? topic;
}

/** Home Assistant discovery configs for every entity the bridge publishes or accepts. */
export function buildDiscoveryMessages(
  schema: RegisterSchema,
  device: DeviceInfo = DVI_LV12_DEVICE,
): DiscoveryMessage[] {
  const messages: DiscoveryMessage[] = [];
  const push = (component: string, uniqueId: string, payload: Record<string, unknown>) => {
    messages.push({
      topic: `${DISCOVERY_PREFIX}/${component}/${uniqueId}/config`,
      payload: { ...payload, device },
    });
  };

  for (const coil of schema.coils.entries) {
    const uid = `${UID_PREFIX}_coil_${coil.index}`;
    push("binary_sensor", uid, {
      name: coil.name,
      state_topic: MEASUREMENT_TOPIC,
      value_template: `{{ 'ON' if value_json.coils['${coil.name}'] == 1 else 'OFF' }}`,
      unique_id: uid,
      device_class: "power",
    });
  }

  for (const register of publishedInputRegisters(schema)) {
    const uid = `${UID_PREFIX}_sensor_${register.address}`;
    push(
      "sensor",
      uid,
      sensorFor(uid, register.label, `{{ value_json.input_registers['${register.label}'] | float }}`, register),
    );
  }

  for (const [register, name] of [
    [schema.power, "EM23 Power"],
    [schema.energy, "EM23 Energy"],
  ] as const) {
    const uid = `${UID_PREFIX}_${register.label}`;
    push("sensor", uid, sensorFor(uid, name, `{{ value_json.input_registers['${register.label}'] | float }}`, register));
  }

  for (const register of schema.echoRegisters) {
    const uid = `${UID_PREFIX}_fc06_${register.label}`;
    push("sensor", uid, sensorFor(uid, register.label, `{{ value_json.write_registers['${register.label}'] }}`));
  }

  for (const command of schema.commands) {
    const name = commandName(command.topic);
    const uid = `${UID_PREFIX}_cmd_${name}`;
    const base = {
      name,
      command_topic: command.topic,
      state_topic: MEASUREMENT_TOPIC,
      value_template: `{{ value_json.write_registers['${command.stateLabel ?? name}'] }}`,
      unique_id: uid,
    };
    if (command.kind === "select") {
      push("select", uid, { ...base, options: command.options ?? ["0", "1"] });
    } else {
      push("number", uid, {
        ...base,
        min: command.min ?? 0,
        max: command.max ?? 100,
        step: command.step ?? 1,
      });
    }
  }

  return messages;
}
