/**
 * Slice: a fixed-extent container over contiguous element slots.
 *
 * A slice is built once by one of the static constructors and never grows
 * past its capacity. It either owns its block (allocated by a storage
 * manager, released on destroy) or borrows it (an adopted caller array, or a
 * sub-range view of another slice). Borrowed slices never destroy elements
 * and never release storage.
 *
 * @example
 * ```typescript
 * const numbers = Slice.of(1, 2, 3, 4, 5);
 * const middle = numbers.slice(1, 4); // aliases [2, 3, 4]
 * middle.set(0, 20);
 * numbers.get(1); // 20
 * numbers.destroy();
 * ```
 */

import {
  defaultStorageManager,
  isSlotCount,
  type StorageAddress,
  type StorageBlock,
  type StorageManager,
} from "./storage.js";
import { constructElements, destroyPrefix, placeAt } from "./lifecycle.js";
import {
  selectStrategy,
  transferTraits,
  type Destroy,
  type ElementTraits,
} from "./traits.js";
import {
  sliceBuildErrorToMessage,
  sliceErr,
  sliceOk,
  type SliceResult,
} from "./result.js";
import {
  AllocationError,
  CapacityExceededError,
  InvalidArgumentError,
  InvalidRangeError,
  OutOfBoundsError,
  StaleViewError,
  UseAfterDestroyError,
} from "./errors.js";
import { logger } from "../util/logger.js";

export type Ownership = "owned" | "borrowed";

/**
 * A mutable reference to one slot. Reads and writes go straight to the
 * backing block, so they are visible through every slice sharing it.
 */
export interface SlotRef<T> {
  readonly index: number;
  get(): T;
  set(value: T): void;
}

/**
 * A finite iterable that knows its element count up front: arrays, strings,
 * typed arrays, sets, maps.
 */
export type SizedIterable<S> = Iterable<S> &
  ({ readonly length: number } | { readonly size: number });

export interface StorageOptions {
  storage?: StorageManager;
}

export interface CapacityOptions<T> extends StorageOptions {
  /** Teardown for elements placed with `emplace`. */
  destroy?: Destroy<T>;
}

export interface FromOptions<T> extends StorageOptions {
  traits?: ElementTraits<T>;
}

interface SliceInit<T> {
  storage: StorageAddress<T> | null;
  length: number;
  capacity: number;
  ownership: Ownership;
  destroy?: Destroy<T>;
}

function hasSize<S>(
  source: SizedIterable<S>,
): source is Iterable<S> & { readonly size: number } {
  // Strings carry `length` and reject the `in` operator.
  return typeof source === "object" && source !== null && "size" in source;
}

export function sizeOf<S>(source: SizedIterable<S>): number {
  return hasSize(source) ? source.size : source.length;
}

export class Slice<T> {
  private storage: StorageAddress<T> | null;
  private len: number;
  private isDestroyed = false;
  private readonly destroyElement: Destroy<T> | undefined;
  readonly capacity: number;
  readonly ownership: Ownership;

  private constructor(init: SliceInit<T>) {
    this.storage = init.storage;
    this.len = init.length;
    this.capacity = init.capacity;
    this.ownership = init.ownership;
    this.destroyElement = init.destroy;
  }

  get length(): number {
    return this.len;
  }

  get hasStorage(): boolean {
    return this.storage !== null;
  }

  get destroyed(): boolean {
    return this.isDestroyed;
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static empty<T>(): Slice<T> {
    return new Slice<T>({
      storage: null,
      length: 0,
      capacity: 0,
      ownership: "owned",
    });
  }

  /**
   * Reserves `capacity` slots without initializing any of them. Fill them in
   * order with `emplace`.
   */
  static withCapacity<T>(
    capacity: number,
    options: CapacityOptions<T> = {},
  ): Slice<T> {
    const manager = options.storage ?? defaultStorageManager;
    const block = manager.allocate<T>(capacity);
    return new Slice<T>({
      storage: block ? { block, offset: 0 } : null,
      length: 0,
      capacity,
      ownership: "owned",
      destroy: options.destroy,
    });
  }

  /**
   * Views the first `count` entries of a caller-owned array without copying.
   * Writes through the slice land in `buffer`; the slice never releases it.
   */
  static adopt<T>(
    buffer: T[] | null,
    count: number,
    options: StorageOptions = {},
  ): Slice<T> {
    if (!isSlotCount(count)) {
      throw new InvalidArgumentError(
        `Count must be a non-negative integer, got ${count}`,
      );
    }
    if (buffer === null) {
      if (count > 0) {
        throw new InvalidArgumentError(
          `Buffer is null with non-zero count ${count}`,
        );
      }
      return Slice.borrow<T>(null, 0);
    }
    if (count > buffer.length) {
      throw new InvalidArgumentError(
        `Count ${count} exceeds buffer length ${buffer.length}`,
      );
    }
    if (count === 0) {
      return Slice.borrow<T>(null, 0);
    }
    const manager = options.storage ?? defaultStorageManager;
    return Slice.borrow({ block: manager.adopt(buffer), offset: 0 }, count);
  }

  /**
   * Builds an owned slice holding one element per source item. Items are
   * taken as-is unless `options.traits` says how to move or copy them.
   *
   * If an element fails to construct, the elements built so far are
   * destroyed, the storage is released, and the original error is thrown.
   */
  static from<T>(
    source: SizedIterable<T>,
    options: FromOptions<T> = {},
  ): Slice<T> {
    return Slice.unwrap(Slice.tryFrom(source, options));
  }

  /**
   * Like `from`, but builds elements of type T from source items of another
   * type through `traits`.
   */
  static convert<T, S>(
    source: SizedIterable<S>,
    traits: ElementTraits<T, S>,
    options: StorageOptions = {},
  ): Slice<T> {
    return Slice.unwrap(Slice.tryConvert(source, traits, options));
  }

  static of<T>(...values: T[]): Slice<T> {
    return Slice.from(values);
  }

  static ofWith<T, S>(traits: ElementTraits<T, S>, ...values: S[]): Slice<T> {
    return Slice.convert(values, traits);
  }

  /**
   * Non-throwing `from`. Rollback has already happened when an error result
   * comes back.
   */
  static tryFrom<T>(
    source: SizedIterable<T>,
    options: FromOptions<T> = {},
  ): SliceResult<T> {
    return Slice.assemble(
      source,
      options.traits ?? transferTraits<T>(),
      options.storage ?? defaultStorageManager,
    );
  }

  static tryConvert<T, S>(
    source: SizedIterable<S>,
    traits: ElementTraits<T, S>,
    options: StorageOptions = {},
  ): SliceResult<T> {
    return Slice.assemble(
      source,
      traits,
      options.storage ?? defaultStorageManager,
    );
  }

  private static assemble<T, S>(
    source: SizedIterable<S>,
    traits: ElementTraits<T, S>,
    manager: StorageManager,
  ): SliceResult<T> {
    const strategy = selectStrategy(traits);
    const count = sizeOf(source);
    if (!isSlotCount(count)) {
      return sliceErr({ type: "source_invalid", declared: count });
    }

    let block: StorageBlock<T> | null;
    try {
      block = manager.allocate<T>(count);
    } catch (err) {
      if (err instanceof AllocationError) {
        return sliceErr({ type: "allocation_failed", error: err });
      }
      throw err;
    }

    const address: StorageAddress<T> | null = block
      ? { block, offset: 0 }
      : null;
    const outcome = constructElements(address, source, count, strategy);
    if (!outcome.ok) {
      Slice.rollback(address, outcome.constructed, traits.destroy);
      return sliceErr(outcome.failure);
    }

    return sliceOk(
      new Slice<T>({
        storage: address,
        length: count,
        capacity: count,
        ownership: "owned",
        destroy: traits.destroy,
      }),
    );
  }

  private static rollback<T>(
    address: StorageAddress<T> | null,
    constructed: number,
    destroy: Destroy<T> | undefined,
  ): void {
    logger.debug("slice.rollback", { constructed });
    try {
      destroyPrefix(address, constructed, destroy);
    } catch (err) {
      logger.warn("Element teardown failed during rollback", { error: err });
    }
    if (address) {
      address.block.manager.release(address.block);
    }
  }

  private static unwrap<T>(result: SliceResult<T>): Slice<T> {
    if (result.ok) {
      return result.slice;
    }
    const { error } = result;
    switch (error.type) {
      case "allocation_failed":
        throw error.error;
      case "element_failed":
      case "source_failed":
        throw error.cause;
      case "source_invalid":
      case "source_exhausted":
      case "source_overflow":
        throw new InvalidArgumentError(sliceBuildErrorToMessage(error));
    }
  }

  private static borrow<T>(
    storage: StorageAddress<T> | null,
    count: number,
  ): Slice<T> {
    return new Slice<T>({
      storage,
      length: count,
      capacity: count,
      ownership: "borrowed",
    });
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  private assertLive(operation: string): void {
    if (this.isDestroyed) {
      throw new UseAfterDestroyError(operation);
    }
    if (this.storage && this.storage.block.released) {
      throw new StaleViewError(this.storage.block.id, operation);
    }
  }

  private addressOf(index: number, operation: string): StorageAddress<T> {
    this.assertLive(operation);
    const storage = this.storage;
    if (
      storage === null ||
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.len
    ) {
      throw new OutOfBoundsError(index, this.len);
    }
    return storage;
  }

  at(index: number): SlotRef<T> {
    const address = this.addressOf(index, "access element");
    return {
      index,
      get: () => {
        this.assertLive("read element");
        return address.block.slots[address.offset + index];
      },
      set: (value) => {
        this.assertLive("write element");
        placeAt(address, index, value);
      },
    };
  }

  get(index: number): T {
    const address = this.addressOf(index, "read element");
    return address.block.slots[address.offset + index];
  }

  set(index: number, value: T): void {
    const address = this.addressOf(index, "write element");
    placeAt(address, index, value);
  }

  /**
   * A borrowed view of slots `[start, end)`. It shares this slice's block,
   * so it is only usable while that block is alive.
   */
  slice(start: number, end: number): Slice<T> {
    this.assertLive("slice");
    const storage = this.storage;
    if (
      storage === null ||
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start >= this.len ||
      end > this.len ||
      end <= start
    ) {
      throw new InvalidRangeError(start, end, this.len);
    }
    return Slice.borrow(
      { block: storage.block, offset: storage.offset + start },
      end - start,
    );
  }

  /**
   * Initializes the next reserved slot and returns its index.
   */
  emplace(value: T): number {
    this.assertLive("emplace");
    const storage = this.storage;
    if (storage === null || this.len === this.capacity) {
      throw new CapacityExceededError(this.capacity);
    }
    const index = this.len;
    placeAt(storage, index, value);
    this.len++;
    return index;
  }

  toArray(): T[] {
    this.assertLive("copy elements");
    if (this.storage === null) {
      return [];
    }
    const { block, offset } = this.storage;
    return block.slots.slice(offset, offset + this.len);
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  /**
   * Destroys live elements and releases storage, for owned slices only.
   * Later calls do nothing.
   */
  destroy(): void {
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;

    const storage = this.storage;
    if (this.ownership === "borrowed" || storage === null) {
      return;
    }
    try {
      destroyPrefix(storage, this.len, this.destroyElement);
    } finally {
      storage.block.manager.release(storage.block);
    }
  }
}
