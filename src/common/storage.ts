import { SensorVaultError, StorageUnavailableError } from "./errors";

/**
 * Runs a storage call, letting domain errors through and wrapping
 * anything the driver throws as a retryable StorageUnavailableError.
 */
export async function guardStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof SensorVaultError) throw e;
    throw new StorageUnavailableError(operation, e);
  }
}
