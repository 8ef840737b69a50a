import { describe, expect, it } from "vitest";
import { DecodeError } from "../src/common/errors";
import {
  decode,
  decodeAdvertisement,
  extractManufacturerPayload,
} from "../src/decoder";
import { formatFromCode, isDataFormat } from "../src/types";
import { bytes, toHex } from "./helpers";

const MAC = [0xaa, 0xbb, 0xcc, 0x11, 0x22, 0x33];

function rawv2(overrides: Record<number, number> = {}): Uint8Array {
  const data = bytes(
    0x05,
    0x01, 0x2c, // temperature 300 -> 1.5 C
    0x4e, 0x20, // humidity 20000 -> 50 %
    0xc8, 0x7d, // pressure 51325 + 50000
    0x03, 0xe8, // x 1000 mG
    0xfc, 0x18, // y -1000 mG
    0x00, 0x00, // z 0
    0xaf, 0x14, // battery 1400 mV above 1600, tx 20 steps
    0x07, // movement
    0x01, 0x02, // sequence
    ...MAC
  );
  for (const [offset, value] of Object.entries(overrides)) {
    data[Number(offset)] = value;
  }
  return data;
}

function format6(): Uint8Array {
  const data = new Uint8Array(24);
  data.set([
    0x06,
    0x0b, 0xb8, // 15 C
    0x27, 0x10, // 25 %
    0xc8, 0x7d,
    0x00, 0x41, // PM2.5 6.5
    0x01, 0xf4, // CO2 500
    0x32, // VOC high bits
    0x05, // NOx high bits
    0x00, 0x00,
    0x2a, // sequence 42
    0xc0, // flags: both LSBs set
  ]);
  return data;
}

function extendedV1(): Uint8Array {
  const data = new Uint8Array(40);
  data.set([
    0xe1,
    0x0b, 0xb8,
    0x27, 0x10,
    0xc8, 0x7d,
    0x00, 0x0a, // PM1.0
    0x00, 0x14, // PM2.5
    0x00, 0x1e, // PM4.0
    0x00, 0x28, // PM10.0
    0xff, 0xff, // CO2 not measured
    0x14, // VOC high bits
    0x01, // NOx high bits
    0x00, 0x27, 0x10, // luminosity 100.00 lux
  ]);
  data.set([0x00, 0x01, 0x02], 25);
  data[28] = 0x40; // VOC LSB only
  data.set(MAC, 34);
  return data;
}

describe("decode", () => {
  it("decodes every RAWv2 field", () => {
    const result = decode(rawv2(), 0x05, { timestamp: 1700000000 });
    expect(result).toEqual({
      ok: true,
      reading: {
        deviceId: "AA:BB:CC:11:22:33",
        timestamp: 1700000000,
        sensorType: "tag",
        format: "RAWv2",
        temperature: 1.5,
        humidity: 50,
        pressure: 101325,
        accelerationX: 1,
        accelerationY: -1,
        accelerationZ: 0,
        batteryVoltage: 3,
        txPower: 0,
        movementCounter: 7,
        measurementSequence: 258,
      },
    });
  });

  it("leaves sentinel values absent rather than zero", () => {
    const result = decode(rawv2({ 1: 0x80, 2: 0x00, 15: 0xff }), 0x05, {
      timestamp: 1700000000,
    });
    if (!result.ok) throw result.error;
    expect(result.reading.temperature).toBeUndefined();
    expect("temperature" in result.reading).toBe(false);
    expect(result.reading.movementCounter).toBeUndefined();
    expect(result.reading.accelerationZ).toBe(0);
  });

  it("leaves humidity and pressure absent at their sentinels", () => {
    const result = decode(rawv2({ 3: 0xff, 4: 0xff, 5: 0xff, 6: 0xff }), 0x05, { timestamp: 1 });
    if (!result.ok) throw result.error;
    expect(result.reading.humidity).toBeUndefined();
    expect(result.reading.pressure).toBeUndefined();
    expect(result.reading.temperature).toBe(1.5);
  });

  it("treats an all-ones power word as missing battery and tx power", () => {
    const result = decode(rawv2({ 13: 0xff, 14: 0xff }), 0x05, { timestamp: 1 });
    if (!result.ok) throw result.error;
    expect(result.reading.batteryVoltage).toBeUndefined();
    expect(result.reading.txPower).toBeUndefined();
  });

  it("decodes RAWv1 sign-and-magnitude temperature", () => {
    const data = bytes(
      0x03, 0x64, 0x81, 0x2d, 0xc8, 0x7d,
      0xfc, 0x18, 0x00, 0x00, 0x03, 0xe8,
      0xaf, 0x14
    );
    const result = decode(data, 0x03, { timestamp: 1700000000, deviceId: "aa:00:00:00:00:01" });
    expect(result).toEqual({
      ok: true,
      reading: {
        deviceId: "AA:00:00:00:00:01",
        timestamp: 1700000000,
        sensorType: "tag",
        format: "RAWv1",
        humidity: 50,
        temperature: -1.45,
        pressure: 101325,
        accelerationX: -1,
        accelerationY: 0,
        accelerationZ: 1,
        batteryVoltage: 3,
        txPower: 0,
      },
    });
  });

  it("decodes a short RAWv1 payload with trailing fields absent", () => {
    const data = bytes(0x03, 0x64, 0x01, 0x32, 0xc8, 0x7d);
    const result = decode(data, 0x03, { timestamp: 5, deviceId: "AA:00:00:00:00:01" });
    if (!result.ok) throw result.error;
    expect(result.reading.temperature).toBe(1.5);
    expect(result.reading.pressure).toBe(101325);
    expect(result.reading.accelerationX).toBeUndefined();
    expect(result.reading.batteryVoltage).toBeUndefined();
  });

  it("decodes Format6 including the 9-bit VOC and NOx indices", () => {
    const result = decode(format6(), 0x06, {
      timestamp: 1700000000,
      deviceId: "AA:00:00:00:00:02",
      rssi: -70,
    });
    expect(result).toEqual({
      ok: true,
      reading: {
        deviceId: "AA:00:00:00:00:02",
        timestamp: 1700000000,
        sensorType: "air",
        format: "Format6",
        temperature: 15,
        humidity: 25,
        pressure: 101325,
        pm2_5: 6.5,
        co2: 500,
        voc: 101,
        nox: 11,
        rssi: -70,
        measurementSequence: 42,
      },
    });
  });

  it("reports VOC as absent when its high byte is 0xFF", () => {
    const data = format6();
    data[11] = 0xff;
    const result = decode(data, 0x06, { timestamp: 1, deviceId: "AA:00:00:00:00:02" });
    if (!result.ok) throw result.error;
    expect(result.reading.voc).toBeUndefined();
    expect(result.reading.nox).toBe(11);
  });

  it("decodes ExtendedV1 and drops an unmeasured CO2", () => {
    const result = decode(extendedV1(), 0xe1, { timestamp: 1700000000 });
    expect(result).toEqual({
      ok: true,
      reading: {
        deviceId: "AA:BB:CC:11:22:33",
        timestamp: 1700000000,
        sensorType: "air",
        format: "ExtendedV1",
        temperature: 15,
        humidity: 25,
        pressure: 101325,
        pm1_0: 1,
        pm2_5: 2,
        pm4_0: 3,
        pm10_0: 4,
        voc: 41,
        nox: 2,
        measurementSequence: 258,
        luminosity: 100,
      },
    });
  });

  it("leaves an unmeasured ExtendedV1 PM channel absent", () => {
    const data = extendedV1();
    data.set([0xff, 0xff], 9);
    const result = decode(data, 0xe1, { timestamp: 1 });
    if (!result.ok) throw result.error;
    expect(result.reading.pm2_5).toBeUndefined();
    expect(result.reading.pm1_0).toBe(1);
    expect(result.reading.pm4_0).toBe(3);
  });

  it("prefers the envelope device id over the payload MAC", () => {
    const result = decode(rawv2(), 0x05, { timestamp: 1, deviceId: "de:ad:be:ef:00:01" });
    if (!result.ok) throw result.error;
    expect(result.reading.deviceId).toBe("DE:AD:BE:EF:00:01");
  });

  it("truncates fractional and Date timestamps to whole seconds", () => {
    const fromNumber = decode(rawv2(), 0x05, { timestamp: 1700000000.9 });
    const fromDate = decode(rawv2(), 0x05, { timestamp: new Date("2023-11-14T22:13:20.750Z") });
    if (!fromNumber.ok) throw fromNumber.error;
    if (!fromDate.ok) throw fromDate.error;
    expect(fromNumber.reading.timestamp).toBe(1700000000);
    expect(fromDate.reading.timestamp).toBe(1700000000);
  });

  it("is deterministic", () => {
    const data = extendedV1();
    const envelope = { timestamp: 1700000000, rssi: -60 };
    expect(decode(data, 0xe1, envelope)).toEqual(decode(data, 0xe1, envelope));
  });

  it.each([
    ["TruncatedPayload", rawv2().subarray(0, 10), 0x05],
    ["UnsupportedFormat", rawv2(), 0x99],
    ["FormatMismatch", rawv2(), 0x06],
    ["TruncatedPayload", bytes(0x03, 0x64, 0x01), 0x03],
    ["TruncatedPayload", extendedV1().subarray(0, 27), 0xe1],
  ])("fails with %s", (code, data, formatId) => {
    const result = decode(data, formatId, { timestamp: 1 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DecodeError);
    expect(result.error.code).toBe(code);
    expect(result.error.retryable).toBe(false);
  });

  it("fails with MissingDeviceId when neither envelope nor payload has one", () => {
    const result = decode(format6(), 0x06, { timestamp: 1 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("MissingDeviceId");
  });
});

describe("extractManufacturerPayload", () => {
  it("finds the payload after the manufacturer header", () => {
    const payload = rawv2();
    const result = extractManufacturerPayload("0201061BFF9904" + toHex(payload));
    expect(result).toEqual(payload);
  });

  it("accepts a bare payload", () => {
    const payload = rawv2();
    expect(extractManufacturerPayload(toHex(payload))).toEqual(payload);
  });

  it.each(["zz", "abc", "", "020106"])("rejects %j", (hex) => {
    const result = extractManufacturerPayload(hex);
    expect(result).toBeInstanceOf(DecodeError);
    if (result instanceof DecodeError) expect(result.code).toBe("InvalidAdvertisement");
  });
});

describe("decodeAdvertisement", () => {
  it("decodes a full advertisement", () => {
    const result = decodeAdvertisement("0201061BFF9904" + toHex(rawv2()), {
      timestamp: 1700000000,
      rssi: -55,
    });
    if (!result.ok) throw result.error;
    expect(result.reading.deviceId).toBe("AA:BB:CC:11:22:33");
    expect(result.reading.format).toBe("RAWv2");
    expect(result.reading.rssi).toBe(-55);
  });

  it("returns the extraction error", () => {
    const result = decodeAdvertisement("nothex", { timestamp: 1 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("InvalidAdvertisement");
  });
});

describe("format lookup", () => {
  it("only knows its own format names", () => {
    expect(isDataFormat("ExtendedV1")).toBe(true);
    expect(isDataFormat("constructor")).toBe(false);
    expect(isDataFormat("hasOwnProperty")).toBe(false);
    expect(formatFromCode(0xe1)).toBe("ExtendedV1");
    expect(formatFromCode(0x04)).toBeNull();
  });
});
