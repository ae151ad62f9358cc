import type { AppConfig } from "./types.js";
import {
  defaultStorageManager,
  type StorageManager,
} from "../slice/storage.js";
import { logger } from "../util/logger.js";

/**
 * Pushes a loaded config into the process-wide logger and a storage
 * manager (the shared default unless one is given).
 */
export function applyConfig(
  config: AppConfig,
  storage: StorageManager = defaultStorageManager,
): void {
  logger.setLevel(config.logLevel);
  storage.configure({
    maxSlotsPerBlock: config.storage.maxSlotsPerBlock,
    maxLiveSlots: config.storage.maxLiveSlots,
  });
  logger.debug("config.applied", { ...config.storage });
}
