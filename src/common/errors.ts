import type { SensorType } from "../types";

export class SensorVaultError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(code: string, message: string, retryable = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

export type DecodeErrorCode =
  | "TruncatedPayload"
  | "UnsupportedFormat"
  | "FormatMismatch"
  | "MissingDeviceId"
  | "InvalidAdvertisement";

// Decoding the same bytes again yields the same error, so none of these retry
export class DecodeError extends SensorVaultError {
  declare readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, message: string) {
    super(code, message, false);
  }
}

export class DeviceTypeConflictError extends SensorVaultError {
  constructor(
    readonly deviceId: string,
    readonly recordedType: SensorType,
    readonly offeredType: SensorType
  ) {
    super(
      "DeviceTypeConflict",
      `Device ${deviceId} is recorded as ${recordedType}, got a ${offeredType} reading`
    );
  }
}

export class NicknameTakenError extends SensorVaultError {
  constructor(readonly nickname: string, readonly ownerMac: string) {
    super("NicknameTaken", `Nickname ${nickname} already belongs to ${ownerMac}`);
  }
}

export class ReadingValidationError extends SensorVaultError {
  constructor(message: string) {
    super("InvalidReading", message);
  }
}

export class InvalidTimeRangeError extends SensorVaultError {
  constructor(readonly start: number, readonly end: number, reason?: string) {
    super("InvalidTimeRange", reason ?? `Query end ${end} is before start ${start}`);
  }
}

export class UnknownDeviceError extends SensorVaultError {
  constructor(readonly identifier: string) {
    super("UnknownDevice", `No device matches ${identifier}`);
  }
}

export class InvalidResolutionError extends SensorVaultError {
  constructor(readonly value: string) {
    super("InvalidResolution", `Unsupported resolution: ${value}`);
  }
}

export class StorageUnavailableError extends SensorVaultError {
  constructor(operation: string, readonly reason: unknown) {
    super(
      "StorageUnavailable",
      `Storage failed during ${operation}: ${describeError(reason)}`,
      true
    );
  }
}

export class ConfigError extends SensorVaultError {
  constructor(message: string) {
    super("InvalidConfig", message);
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
