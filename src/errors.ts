export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
  }
}

export type ProtocolOperation = "readCoils" | "readInputRegister" | "echoRead" | "writeRegister";

/** Failure of a single device transaction, tagged with the address it targeted. */
export class ProtocolError extends BridgeError {
  constructor(
    message: string,
    readonly operation: ProtocolOperation,
    readonly address: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

export class FramingError extends ProtocolError {
  constructor(
    message: string,
    operation: ProtocolOperation,
    address: number,
    options?: { cause?: unknown },
  ) {
    super(message, operation, address, options);
    this.name = "FramingError";
  }
}

export class TransportError extends ProtocolError {
  constructor(
    message: string,
    operation: ProtocolOperation,
    address: number,
    options?: { cause?: unknown },
  ) {
    super(message, operation, address, options);
    this.name = "TransportError";
  }
}

export class ParseError extends BridgeError {
  constructor(
    message: string,
    readonly topic: string,
    readonly payload: string,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
