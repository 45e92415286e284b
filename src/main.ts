import "dotenv/config";

import { loadConfig } from "./config/options";
import { createLogger } from "./logger";
import { DVI_LV12_SCHEMA } from "./heatpump/definitions";
import { BridgeEngine } from "./services/bridgeEngine";
import { buildDiscoveryMessages } from "./services/discovery";
import { ModbusRtuClient } from "./services/modbus/ModbusRtuClient";
import { MqttService } from "./services/mqttService";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const modbus = new ModbusRtuClient(
  {
    path: config.modbus.path,
    unitId: config.modbus.unitId,
    baudRate: config.modbus.baudRate,
    timeoutMs: config.modbus.timeoutMs,
    reconnectMs: config.modbus.reconnectMs,
  },
  logger,
);
const mqttService = new MqttService(config.mqtt, logger);
const engine = new BridgeEngine(modbus, mqttService, logger, { schema: DVI_LV12_SCHEMA });

async function start() {
  if (config.discoveryEnabled) {
    mqttService.setDiscovery(buildDiscoveryMessages(engine.schema));
  }
  mqttService.onMessage((topic, payload) => engine.handleMessage(topic, payload));
  await mqttService.subscribe(engine.commandTopics());
  mqttService.connect();

  try {
    await modbus.connect();
  } catch (err) {
    // The client keeps retrying in the background; polls fail until it opens.
    logger.warn({ err }, "Serial port not available yet");
  }

  engine.start();
  logger.info({ unitId: config.modbus.unitId, path: config.modbus.path }, "DVI bridge running");
}

async function shutdown(signal: string) {
  logger.info({ signal }, "Shutting down DVI bridge");
  engine.stop();
  await mqttService.disconnect();
  await modbus.close();
  process.exit(0);
}

process.on("SIGINT", (signal) => {
  void shutdown(signal.toString());
});

process.on("SIGTERM", (signal) => {
  void shutdown(signal.toString());
});

void start().catch((error) => {
  logger.fatal({ error }, "Failed to start bridge");
  process.exit(1);
});
