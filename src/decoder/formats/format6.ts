import { PayloadReader, field, nineBit, round } from "../bytes";
import { presentValues, type FormatDecoder } from "../types";
import { decodeEnvironment } from "./environment";

/**
 * Format 6, the air-quality broadcast for BLE4 receivers. Luminosity
 * (byte 13), sound level (byte 14) and the partial MAC (bytes 17-19) are
 * not part of the stored field set and are skipped.
 */
export const format6: FormatDecoder = {
  format: "Format6",
  minLength: 24,
  decode(payload) {
    const reader = new PayloadReader(payload);
    const flags = reader.u8(16) ?? 0;

    return {
      format: "Format6",
      sensorType: "air",
      values: presentValues({
        ...decodeEnvironment(reader),
        pm2_5: field(reader.u16(7), 0xffff, (r) => round(r / 10, 1)),
        co2: field(reader.u16(9), 0xffff),
        voc: nineBit(reader.u8(11), flags, 6),
        nox: nineBit(reader.u8(12), flags, 7),
      }),
      measurementSequence: reader.u8(15),
    };
  },
};
