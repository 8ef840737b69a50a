/**
 * Big-endian field reader over a sensor payload. Reads that run past the
 * end of the buffer return `undefined` so trailing optional fields decode
 * as absent.
 */
export class PayloadReader {
  constructor(private readonly bytes: Uint8Array) {}

  get length(): number {
    return this.bytes.length;
  }

  has(offset: number, width: number): boolean {
    return offset >= 0 && offset + width <= this.bytes.length;
  }

  u8(offset: number): number | undefined {
    if (!this.has(offset, 1)) return undefined;
    return this.bytes[offset];
  }

  u16(offset: number): number | undefined {
    if (!this.has(offset, 2)) return undefined;
    return (this.bytes[offset] << 8) | this.bytes[offset + 1];
  }

  s16(offset: number): number | undefined {
    const raw = this.u16(offset);
    if (raw === undefined) return undefined;
    return raw < 0x8000 ? raw : raw - 0x10000;
  }

  u24(offset: number): number | undefined {
    if (!this.has(offset, 3)) return undefined;
    return (
      (this.bytes[offset] << 16) |
      (this.bytes[offset + 1] << 8) |
      this.bytes[offset + 2]
    );
  }

  mac(offset: number): string | undefined {
    if (!this.has(offset, 6)) return undefined;
    return Array.from(this.bytes.subarray(offset, offset + 6), (b) =>
      b.toString(16).toUpperCase().padStart(2, "0")
    ).join(":");
  }
}

/** Applies `convert` unless the raw value is missing or equals the sentinel. */
export function field(
  raw: number | undefined,
  sentinel: number | null,
  convert: (raw: number) => number = (r) => r
): number | undefined {
  if (raw === undefined || raw === sentinel) return undefined;
  return convert(raw);
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * VOC and NOx travel as 9-bit values: the high eight bits in their own
 * byte and the lowest bit in a shared flags byte. A high byte of 0xFF
 * (510 or 511) means no measurement.
 */
export function nineBit(high: number | undefined, flags: number, lsbBit: number) {
  if (high === undefined || high === 0xff) return undefined;
  return (high << 1) | ((flags >> lsbBit) & 1);
}

export function hexToBytes(hex: string): Uint8Array | null {
  const clean = hex.trim().replace(/^0x/i, "");
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) return null;
  return Uint8Array.from(Buffer.from(clean, "hex"));
}
