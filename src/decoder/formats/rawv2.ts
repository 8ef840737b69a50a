import { PayloadReader, field, round } from "../bytes";
import { presentValues, type FormatDecoder } from "../types";
import { decodeEnvironment } from "./environment";
import { decodePower } from "./power";

const ACCELERATION_ABSENT = -0x8000;

function milliG(raw: number | undefined) {
  return field(raw, ACCELERATION_ABSENT, (r) => round(r / 1000, 3));
}

/** RAWv2 (format 5), 24 bytes ending in the broadcaster's MAC. */
export const rawv2: FormatDecoder = {
  format: "RAWv2",
  minLength: 24,
  decode(payload) {
    const reader = new PayloadReader(payload);
    const power = decodePower(reader.u16(13));

    return {
      format: "RAWv2",
      sensorType: "tag",
      values: presentValues({
        ...decodeEnvironment(reader),
        accelerationX: milliG(reader.s16(7)),
        accelerationY: milliG(reader.s16(9)),
        accelerationZ: milliG(reader.s16(11)),
        batteryVoltage: power.batteryVoltage,
        txPower: power.txPower,
        movementCounter: field(reader.u8(15), 0xff),
      }),
      measurementSequence: field(reader.u16(16), 0xffff),
      mac: reader.mac(18),
    };
  },
};
