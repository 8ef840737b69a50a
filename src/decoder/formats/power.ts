import { field, round } from "../bytes";

const BATTERY_ABSENT = 0x7ff;
const TX_POWER_ABSENT = 0x1f;

/**
 * Splits the 16-bit power word: battery in the upper 11 bits (mV above
 * 1600), transmit power in the lower 5 bits (2 dBm steps from -40).
 */
export function decodePower(raw: number | undefined) {
  if (raw === undefined) {
    return { batteryVoltage: undefined, txPower: undefined };
  }
  return {
    batteryVoltage: field(raw >> 5, BATTERY_ABSENT, (mv) => round((mv + 1600) / 1000, 3)),
    txPower: field(raw & 0x1f, TX_POWER_ABSENT, (steps) => steps * 2 - 40),
  };
}
