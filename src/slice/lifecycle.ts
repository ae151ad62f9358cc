/**
 * Element lifecycle: placing values into reserved slots and tearing down a
 * live prefix. Used for normal destruction and for rollback after a build
 * fails partway.
 */

import type { StorageAddress } from "./storage.js";
import type { ConstructionStrategy, Destroy } from "./traits.js";
import {
  constructErr,
  constructOk,
  type ConstructOutcome,
} from "./result.js";
import { ElementDestroyError } from "./errors.js";
import { logger } from "../util/logger.js";

export function placeAt<T>(
  address: StorageAddress<T>,
  index: number,
  value: T,
): void {
  address.block.slots[address.offset + index] = value;
}

function closeIterator<S>(iterator: Iterator<S>): void {
  try {
    iterator.return?.();
  } catch (err) {
    logger.warn("Source iterator failed to close", { error: err });
  }
}

/**
 * Builds elements `[0, count)` from `source` in order. Stops at the first
 * failure and reports how many slots were initialized before it; never
 * throws for element or source problems, including a source iterator that
 * throws.
 */
export function constructElements<T, S>(
  address: StorageAddress<T> | null,
  source: Iterable<S>,
  count: number,
  strategy: ConstructionStrategy<T, S>,
): ConstructOutcome {
  logger.debug("slice.construct", { strategy: strategy.kind, count });

  let constructed = 0;
  let iterator: Iterator<S>;
  try {
    iterator = source[Symbol.iterator]();
  } catch (cause) {
    return constructErr(constructed, {
      type: "source_failed",
      index: constructed,
      cause,
    });
  }

  for (;;) {
    let step: IteratorResult<S>;
    try {
      step = iterator.next();
    } catch (cause) {
      return constructErr(constructed, {
        type: "source_failed",
        index: constructed,
        cause,
      });
    }
    if (step.done) break;

    if (constructed === count || address === null) {
      closeIterator(iterator);
      return constructErr(constructed, {
        type: "source_overflow",
        expected: count,
      });
    }
    let value: T;
    try {
      value = strategy.construct(step.value);
    } catch (cause) {
      closeIterator(iterator);
      return constructErr(constructed, {
        type: "element_failed",
        index: constructed,
        cause,
      });
    }
    placeAt(address, constructed, value);
    constructed++;
  }

  if (constructed < count) {
    return constructErr(constructed, {
      type: "source_exhausted",
      expected: count,
      actual: constructed,
    });
  }
  return constructOk(constructed);
}

/**
 * Runs `destroy` once on each live slot in `[0, count)`. Without a destroy
 * hook this does nothing at all. Every slot is visited even when a hook
 * throws; the failures are then raised together.
 */
export function destroyPrefix<T>(
  address: StorageAddress<T> | null,
  count: number,
  destroy?: Destroy<T>,
): void {
  if (address === null || destroy === undefined || count === 0) {
    return;
  }

  logger.debug("slice.destroyPrefix", {
    blockId: address.block.id,
    count,
  });

  const failures: Array<{ index: number; error: unknown }> = [];
  const { slots } = address.block;
  for (let index = 0; index < count; index++) {
    const slot = address.offset + index;
    try {
      destroy(slots[slot]);
    } catch (error) {
      failures.push({ index, error });
    }
  }

  if (failures.length > 0) {
    throw new ElementDestroyError(failures);
  }
}
