import ModbusRTU from "modbus-serial";
import type { Logger } from "pino";

export interface ModbusRtuConfig {
  path: string;
  unitId: number;
  baudRate?: number;
  timeoutMs?: number;
  reconnectMs?: number;
}

export interface RegisterEcho {
  address: number;
  value: number;
}

/** The wire operations the heat pump needs; one call is one request/response exchange. */
export interface DeviceTransport {
  /** FC01 response payload: byte count followed by the packed coil bytes. */
  readCoilFrame(start: number, count: number): Promise<Uint8Array>;
  readInput(start: number, length: number): Promise<number[]>;
  /** FC06; resolves with the address/value pair the device replied with. */
  writeSingle(address: number, value: number): Promise<RegisterEcho>;
}

export class ModbusRtuClient implements DeviceTransport {
  private client = new ModbusRTU();
  private connected = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closing = false;

  constructor(
    private readonly cfg: ModbusRtuConfig,
    private readonly logger: Logger,
  ) {
    const timeout = cfg.timeoutMs ?? 2000;
    this.client.setTimeout(timeout);
  }

  async connect(): Promise<void> {
    await this.safeDisconnect();
    this.closing = false;
    this.logger.info({ path: this.cfg.path, baudRate: this.cfg.baudRate ?? 9600 }, "Opening Modbus RTU port");
    try {
      await this.client.connectRTUBuffered(this.cfg.path, {
        baudRate: this.cfg.baudRate ?? 9600,
        dataBits: 8,
        parity: "none",
        stopBits: 1,
      });
      this.client.setID(this.cfg.unitId);
      this.connected = true;
      this.logger.info({ unitId: this.cfg.unitId }, "Modbus RTU connected");
    } catch (err) {
      this.logger.warn({ err, path: this.cfg.path }, "Modbus RTU connect failed");
      this.scheduleReconnect();
      throw err;
    }
  }

  private scheduleReconnect() {
    if (this.reconnectTimer || this.closing) return;
    const wait = this.cfg.reconnectMs ?? 3000;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        this.logger.debug({ err }, "Modbus RTU reconnect attempt failed");
      });
    }, wait);
  }

  async safeDisconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await new Promise<void>((resolve) => {
      try {
        this.client.close(() => {
          this.logger.info("Modbus RTU disconnected");
          resolve();
        });
      } catch (e) {
        this.logger.warn({ e }, "Modbus RTU disconnect error");
        resolve();
      }
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    await this.safeDisconnect();
  }

  isConnected() {
    return this.connected && this.client.isOpen;
  }

  private ensureOpen(): void {
    if (this.isConnected()) return;
    this.scheduleReconnect();
    throw new Error(`Modbus RTU port ${this.cfg.path} is not open`);
  }

  async readCoilFrame(start: number, count: number): Promise<Uint8Array> {
    this.ensureOpen();
    const res = await this.client.readCoils(start, count);
    // modbus-serial strips the byte count; put it back so the frame can be checked as received
    return Uint8Array.from([res.buffer.length, ...res.buffer]);
  }

  async readInput(start: number, length: number): Promise<number[]> {
    this.ensureOpen();
    const res = await this.client.readInputRegisters(start, length);
    return Array.from(res.data);
  }

  async writeSingle(address: number, value: number): Promise<RegisterEcho> {
    this.ensureOpen();
    const res = await this.client.writeRegister(address, value);
    return { address: res.address, value: res.value };
  }
}
