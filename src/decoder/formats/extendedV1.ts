import { PayloadReader, field, nineBit, round } from "../bytes";
import { presentValues, type FormatDecoder } from "../types";
import { decodeEnvironment } from "./environment";

function particulate(raw: number | undefined) {
  return field(raw, 0xffff, (r) => round(r / 10, 1));
}

/**
 * Extended v1 (0xE1), the full air-quality broadcast:
 *
 *   7-14   PM1.0, PM2.5, PM4.0, PM10.0  (u16, 0.1 µg/m³)
 *   15-16  CO₂                          (u16, ppm)
 *   17,18  VOC, NOx high bits           (LSBs in flags byte 28)
 *   19-21  luminosity                   (u24, 0.01 lux)
 *   25-27  measurement sequence         (u24)
 *   34-39  MAC
 *
 * The flags byte and MAC may be cut from short captures; the rest is
 * required.
 */
export const extendedV1: FormatDecoder = {
  format: "ExtendedV1",
  minLength: 28,
  decode(payload) {
    const reader = new PayloadReader(payload);
    const flags = reader.u8(28) ?? 0;

    return {
      format: "ExtendedV1",
      sensorType: "air",
      values: presentValues({
        ...decodeEnvironment(reader),
        pm1_0: particulate(reader.u16(7)),
        pm2_5: particulate(reader.u16(9)),
        pm4_0: particulate(reader.u16(11)),
        pm10_0: particulate(reader.u16(13)),
        co2: field(reader.u16(15), 0xffff),
        voc: nineBit(reader.u8(17), flags, 6),
        nox: nineBit(reader.u8(18), flags, 7),
      }),
      luminosity: field(reader.u24(19), 0xffffff, (r) => round(r / 100, 2)),
      measurementSequence: field(reader.u24(25), 0xffffff),
      mac: reader.mac(34),
    };
  },
};
