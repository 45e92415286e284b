export interface AppConfig {
  logLevel: string;
  mqtt: {
    host: string;
    port: number;
    user: string | null;
    password: string | null;
    clientId: string;
    reconnectMinMs: number;
    reconnectMaxMs: number;
  };
  modbus: {
    path: string;
    unitId: number;
    baudRate: number;
    timeoutMs: number;
    reconnectMs: number;
  };
  discoveryEnabled: boolean;
}

const DEFAULT_SERIAL_PATH =
  "/dev/serial/by-id/usb-STMicroelectronics_STM32_Virtual_COM_Port_48D874673036-if00";

let current: AppConfig | null = null;

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  // Accepts 0x-prefixed values, unit ids are usually written in hex
  const parsed = raw.toLowerCase().startsWith("0x")
    ? Number.parseInt(raw.slice(2), 16)
    : Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return !["0", "false", "no", "off"].includes(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  current = {
    logLevel: readString(env, "LOG_LEVEL", "info"),
    mqtt: {
      host: readString(env, "MQTT_HOST", "127.0.0.1"),
      port: readInt(env, "MQTT_PORT", 1883),
      user: readString(env, "MQTT_USER", "default_user"),
      password: readString(env, "MQTT_PASS", "default_pass"),
      clientId: readString(env, "MQTT_CLIENT_ID", "dvi-bridge"),
      reconnectMinMs: readInt(env, "MQTT_RECONNECT_MIN_MS", 1_000),
      reconnectMaxMs: readInt(env, "MQTT_RECONNECT_MAX_MS", 60_000),
    },
    modbus: {
      path: readString(env, "MODBUS_SERIAL_PATH", DEFAULT_SERIAL_PATH),
      unitId: readInt(env, "MODBUS_UNIT_ID", 0x10),
      baudRate: readInt(env, "MODBUS_BAUD_RATE", 9600),
      timeoutMs: readInt(env, "MODBUS_TIMEOUT_MS", 2_000),
      reconnectMs: readInt(env, "MODBUS_RECONNECT_MS", 3_000),
    },
    discoveryEnabled: readBool(env, "DISCOVERY_ENABLED", true),
  };
  return current;
}

export function getConfig(): AppConfig {
  if (!current) {
    throw new Error("Configuration not loaded; call loadConfig() first");
  }
  return current;
}
