import { field, round, type PayloadReader } from "../bytes";

// Temperature, humidity and pressure share one layout at bytes 1-6 in
// every format but RAWv1.
export function decodeEnvironment(reader: PayloadReader) {
  return {
    temperature: field(reader.s16(1), -0x8000, (r) => round(r / 200, 2)),
    humidity: field(reader.u16(3), 0xffff, (r) => round(r / 400, 2)),
    pressure: field(reader.u16(5), 0xffff, (r) => r + 50000),
  };
}
