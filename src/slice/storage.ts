/**
 * Storage manager for fixed-slice
 *
 * Hands out blocks of reserved, uninitialized element slots and takes them
 * back. It never constructs or destroys elements; that is the job of the
 * element lifecycle functions in ./lifecycle.ts.
 *
 * A block is either allocated here (origin "allocated") or wraps an array the
 * caller already owns (origin "adopted"). Only allocated blocks of this
 * manager may be released.
 */

import {
  DEFAULT_MAX_LIVE_SLOTS,
  DEFAULT_MAX_SLOTS_PER_BLOCK,
} from "../config/constants.js";
import {
  AllocationError,
  InvalidArgumentError,
  ReleaseViolationError,
} from "./errors.js";
import { logger } from "../util/logger.js";

export type StorageOrigin = "allocated" | "adopted";

export interface StorageBlock<T> {
  readonly id: number;
  readonly slots: T[];
  readonly capacity: number;
  readonly origin: StorageOrigin;
  readonly manager: StorageManager;
  released: boolean;
}

/**
 * A position inside a block. Sub-range views share the parent's block and
 * differ only in offset.
 */
export interface StorageAddress<T> {
  readonly block: StorageBlock<T>;
  readonly offset: number;
}

export interface StorageManagerOptions {
  maxSlotsPerBlock: number;
  maxLiveSlots: number;
}

export interface StorageStats {
  allocations: number;
  releases: number;
  failures: number;
  liveBlocks: number;
  liveSlots: number;
}

const DEFAULT_STORAGE_OPTIONS: StorageManagerOptions = {
  maxSlotsPerBlock: DEFAULT_MAX_SLOTS_PER_BLOCK,
  maxLiveSlots: DEFAULT_MAX_LIVE_SLOTS,
};

let nextBlockId = 1;

export function isSlotCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export class StorageManager {
  private options: StorageManagerOptions;
  private stats: StorageStats = {
    allocations: 0,
    releases: 0,
    failures: 0,
    liveBlocks: 0,
    liveSlots: 0,
  };

  constructor(options: Partial<StorageManagerOptions> = {}) {
    this.options = { ...DEFAULT_STORAGE_OPTIONS, ...options };
  }

  configure(options: Partial<StorageManagerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): Readonly<StorageManagerOptions> {
    return { ...this.options };
  }

  /**
   * Reserves `capacity` uninitialized slots. Zero capacity reserves nothing
   * and yields `null`.
   */
  allocate<T>(capacity: number): StorageBlock<T> | null {
    if (!isSlotCount(capacity)) {
      throw new InvalidArgumentError(
        `Capacity must be a non-negative integer, got ${capacity}`,
      );
    }
    if (capacity === 0) {
      return null;
    }

    if (capacity > this.options.maxSlotsPerBlock) {
      this.stats.failures++;
      throw new AllocationError(
        capacity,
        `Cannot allocate ${capacity} slots: block limit is ${this.options.maxSlotsPerBlock}`,
      );
    }
    if (this.stats.liveSlots + capacity > this.options.maxLiveSlots) {
      this.stats.failures++;
      throw new AllocationError(
        capacity,
        `Cannot allocate ${capacity} slots: ${this.stats.liveSlots} of ${this.options.maxLiveSlots} already in use`,
      );
    }

    let slots: T[];
    try {
      slots = new Array<T>(capacity);
    } catch (err) {
      this.stats.failures++;
      throw new AllocationError(
        capacity,
        `Cannot allocate ${capacity} slots`,
        { cause: err },
      );
    }

    const block: StorageBlock<T> = {
      id: nextBlockId++,
      slots,
      capacity,
      origin: "allocated",
      manager: this,
      released: false,
    };
    this.stats.allocations++;
    this.stats.liveBlocks++;
    this.stats.liveSlots += capacity;
    logger.debug("storage.allocate", { blockId: block.id, capacity });
    return block;
  }

  /**
   * Wraps a caller-owned array without copying it. The result aliases
   * `buffer` and is never released.
   */
  adopt<T>(buffer: T[]): StorageBlock<T> {
    return {
      id: nextBlockId++,
      slots: buffer,
      capacity: buffer.length,
      origin: "adopted",
      manager: this,
      released: false,
    };
  }

  release<T>(block: StorageBlock<T> | null): void {
    if (block === null) {
      return;
    }
    if (block.origin !== "allocated") {
      throw new ReleaseViolationError(
        block.id,
        `Block ${block.id} was adopted, not allocated, and cannot be released`,
      );
    }
    if (block.manager !== this) {
      throw new ReleaseViolationError(
        block.id,
        `Block ${block.id} belongs to another storage manager`,
      );
    }
    if (block.released) {
      throw new ReleaseViolationError(
        block.id,
        `Block ${block.id} has already been released`,
      );
    }

    block.released = true;
    block.slots.length = 0;
    this.stats.releases++;
    this.stats.liveBlocks--;
    this.stats.liveSlots -= block.capacity;
    logger.debug("storage.release", {
      blockId: block.id,
      capacity: block.capacity,
    });
  }

  getStats(): StorageStats {
    return { ...this.stats };
  }
}

export const defaultStorageManager = new StorageManager();
