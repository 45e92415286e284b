import { FramingError } from "../errors";
import type { EchoRegister, RegisterSchema } from "./definitions";

// FC06 echo read: the device answers a zero-value single-register write with the
// register's current content instead of echoing the request.
export const ECHO_READ_VALUE = 0x0000;

export function scaleRaw(raw: number, scale: number, decimals: number): number {
  return Number((raw * scale).toFixed(decimals));
}

/** Big-endian word pair (high word first) as an unsigned 32-bit value. */
export function combineWords(high: number, low: number): number {
  return (high & 0xffff) * 0x10000 + (low & 0xffff);
}

/**
 * Decodes an FC01 response payload: byte count followed by the coil bytes.
 * Byte 1 carries coils 0-7 and byte 2 coils 8-15.
 */
export function decodeCoilMask(frame: Uint8Array, expectedByteCount: number, address: number): number {
  if (frame.length < expectedByteCount + 1 || frame[0] !== expectedByteCount) {
    throw new FramingError(
      `FC01 response malformed: byte count ${frame[0] ?? "missing"}, length ${frame.length}`,
      "readCoils",
      address,
    );
  }
  let mask = 0;
  for (let i = expectedByteCount; i >= 1; i--) {
    mask = mask * 0x100 + (frame[i] ?? 0);
  }
  return mask;
}

export function coilsFromMask(mask: number, coils: RegisterSchema["coils"]): Record<string, boolean> {
  const out: Record<string, boolean> = {};
  for (const coil of coils.entries) {
    out[coil.name] = Math.floor(mask / 2 ** coil.index) % 2 === 1;
  }
  return out;
}

export function applyEchoAdjustment(raw: number, register: EchoRegister): number {
  if (!register.adjust) return raw;
  return scaleRaw(raw, register.adjust.multiplier, register.adjust.decimals);
}

/** Label-sorted copy; ordering is plain code-unit string comparison. */
export function sortByLabel<T>(values: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(values).sort()) {
    const value = values[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}
