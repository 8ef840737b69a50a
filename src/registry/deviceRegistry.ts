import type { Logger } from "../common/logger";
import { DeviceTypeConflictError, NicknameTakenError } from "../common/errors";
import { SerialQueue } from "../common/serialQueue";
import { guardStorage } from "../common/storage";
import { toEpochSeconds } from "../common/time";
import type { DeviceRepository } from "../db/repositories";
import { normalizeMac, type Device, type SensorType } from "../types";

export interface DeviceRegistryOptions {
  repository: DeviceRepository;
  logger: Logger;
  /** Shared with the store so registry and reading writes do not interleave. */
  writeQueue?: SerialQueue;
  now?: () => Date;
}

export interface DeviceChanges {
  nickname?: string;
  description?: string;
  bleUuid?: string;
}

/**
 * Maps device ids to their metadata and registers unseen devices with
 * an auto-generated nickname (`air1`, `tag2`, ...). A device's sensor
 * type is fixed when it is first seen.
 */
export class DeviceRegistry {
  private readonly repo: DeviceRepository;
  private readonly logger: Logger;
  private readonly queue: SerialQueue;
  private readonly now: () => Date;

  constructor(options: DeviceRegistryOptions) {
    this.repo = options.repository;
    this.logger = options.logger;
    this.queue = options.writeQueue ?? new SerialQueue();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Returns the device for `deviceId`, creating it on first sight. The
   * new row is persisted before this resolves.
   */
  resolve(deviceId: string, sensorType: SensorType): Promise<Device> {
    const mac = normalizeMac(deviceId);
    return this.queue.run(() =>
      guardStorage("resolve-device", async () => {
        const existing = await this.repo.get(mac);
        if (existing) return this.checkType(existing, sensorType);

        const device: Device = {
          mac,
          sensorType,
          nickname: await this.nextNickname(sensorType),
          createdAt: toEpochSeconds(this.now()),
        };
        if (!(await this.repo.insertIfAbsent(device))) {
          // written by another connection between our read and insert
          const winner = await this.repo.get(mac);
          if (!winner) throw new Error(`Device ${mac} vanished during registration`);
          return this.checkType(winner, sensorType);
        }
        this.logger
          .with()
          .str("mac", mac)
          .str("nickname", device.nickname)
          .str("sensorType", sensorType)
          .logger()
          .info("Registered new device");
        return device;
      })
    );
  }

  get(mac: string): Promise<Device | null> {
    return guardStorage("get-device", () => this.repo.get(normalizeMac(mac)));
  }

  findByNickname(nickname: string): Promise<Device | null> {
    return guardStorage("find-device", () => this.repo.findByNickname(nickname.trim()));
  }

  /** Accepts a nickname (case-insensitive) or a MAC address. */
  async lookup(identifier: string): Promise<Device | null> {
    return (await this.findByNickname(identifier)) ?? (await this.get(identifier));
  }

  list(): Promise<Device[]> {
    return guardStorage("list-devices", () => this.repo.list());
  }

  /** Edits descriptive metadata. The sensor type cannot be changed. */
  update(mac: string, changes: DeviceChanges): Promise<Device | null> {
    const id = normalizeMac(mac);
    return this.queue.run(() =>
      guardStorage("update-device", async () => {
        const device = await this.repo.get(id);
        if (!device) return null;
        if (changes.nickname !== undefined) {
          const owner = await this.repo.findByNickname(changes.nickname);
          if (owner && owner.mac !== id) {
            throw new NicknameTakenError(changes.nickname, owner.mac);
          }
        }
        await this.repo.update(id, changes);
        return this.repo.get(id);
      })
    );
  }

  private checkType(device: Device, offered: SensorType): Device {
    if (device.sensorType !== offered) {
      const err = new DeviceTypeConflictError(device.mac, device.sensorType, offered);
      this.logger.with().error(err).logger().warn("Device type conflict");
      throw err;
    }
    return device;
  }

  // 1 + devices of this type, moved past any name a renamed device took
  private async nextNickname(sensorType: SensorType): Promise<string> {
    const devices = await this.repo.list();
    const taken = new Set(devices.map((d) => d.nickname.toLowerCase()));
    let n = devices.filter((d) => d.sensorType === sensorType).length + 1;
    while (taken.has(`${sensorType}${n}`)) n++;
    return `${sensorType}${n}`;
  }
}
