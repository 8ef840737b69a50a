import { PayloadReader, field, round } from "../bytes";
import { presentValues, type FormatDecoder } from "../types";
import { decodePower } from "./power";

/**
 * RAWv1 (format 3). Temperature is sign-and-magnitude: bit 7 of byte 2 is
 * the sign, bits 0-6 the whole degrees, byte 3 the hundredths.
 */
export const rawv1: FormatDecoder = {
  format: "RAWv1",
  minLength: 5,
  decode(payload) {
    const reader = new PayloadReader(payload);

    let temperature: number | undefined;
    const whole = reader.u8(2);
    const fraction = reader.u8(3);
    if (whole !== undefined && fraction !== undefined) {
      const magnitude = (whole & 0x7f) + fraction / 100;
      temperature = round(whole & 0x80 ? -magnitude : magnitude, 2);
    }

    const power = decodePower(reader.u16(12));

    return {
      format: "RAWv1",
      sensorType: "tag",
      values: presentValues({
        humidity: field(reader.u8(1), null, (r) => r / 2),
        temperature,
        pressure: field(reader.u16(4), null, (r) => r + 50000),
        accelerationX: field(reader.s16(6), null, (r) => r / 1000),
        accelerationY: field(reader.s16(8), null, (r) => r / 1000),
        accelerationZ: field(reader.s16(10), null, (r) => r / 1000),
        batteryVoltage: power.batteryVoltage,
        txPower: power.txPower,
      }),
    };
  },
};
